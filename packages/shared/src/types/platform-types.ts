export const OS_FAMILIES = ['windows', 'linux', 'mac', 'unix', 'unsupported'] as const;
export type OsFamily = (typeof OS_FAMILIES)[number];

/** Environment resolved for the current OS, handed to whatever launches external programs */
export interface RuntimeEnvironment {
  osFamily: OsFamily;
  /** Variables set by this library */
  overrides: Readonly<Record<string, string>>;
  /** Base environment merged with the overrides */
  env: Readonly<Record<string, string | undefined>>;
}

/** Program + arguments that open a file with the default application */
export interface OpenCommand {
  command: string;
  args: string[];
  /** Pass arguments to cmd.exe without re-quoting */
  verbatimArguments: boolean;
}
