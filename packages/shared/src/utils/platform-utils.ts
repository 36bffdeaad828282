import type { OpenCommand, OsFamily } from '../types/platform-types';

const FAMILY_BY_PLATFORM: Readonly<Record<string, OsFamily>> = {
  win32: 'windows',
  cygwin: 'windows',
  linux: 'linux',
  android: 'linux',
  darwin: 'mac',
  aix: 'unix',
  freebsd: 'unix',
  openbsd: 'unix',
  netbsd: 'unix',
  sunos: 'unix',
};

/**
 * Map a Node.js platform id (`process.platform`) to its OS family
 */
export function resolveOsFamily(platform: string): OsFamily {
  if (!Object.hasOwn(FAMILY_BY_PLATFORM, platform)) return 'unsupported';
  return FAMILY_BY_PLATFORM[platform] ?? 'unsupported';
}

/**
 * Build the command that opens `absolutePath` with the default application.
 * An `override` ("libreoffice --calc") replaces the platform program; the path is appended.
 * Returns null when the OS family has no known opener.
 */
export function buildOpenCommand(
  osFamily: OsFamily,
  absolutePath: string,
  override?: string,
): OpenCommand | null {
  const custom = override?.trim().split(/\s+/).filter(Boolean) ?? [];
  const [customCommand, ...customArgs] = custom;
  if (customCommand) {
    return { command: customCommand, args: [...customArgs, absolutePath], verbatimArguments: false };
  }

  switch (osFamily) {
    case 'windows':
      // `start` takes the first quoted argument as the window title
      return {
        command: 'cmd',
        args: ['/c', 'start', '""', `"${absolutePath}"`],
        verbatimArguments: true,
      };
    case 'mac':
      return { command: 'open', args: [absolutePath], verbatimArguments: false };
    case 'linux':
    case 'unix':
      return { command: 'xdg-open', args: [absolutePath], verbatimArguments: false };
    case 'unsupported':
      return null;
  }
}
