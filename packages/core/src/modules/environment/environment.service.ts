import { Inject, Injectable, Logger } from '@nestjs/common';
import { resolveOsFamily, type RuntimeEnvironment } from '@xlsxboost/shared';
import { XLSX_BOOST_CONFIG } from '../../config/tokens';
import type { XlsxBoostConfig } from '../../config/xlsx-boost.config';

type EnvRecord = Record<string, string | undefined>;

export interface InitializeOptions {
  /** Clear JAVA_HOME for launched programs (defaults to the configured value) */
  resetJavaHome?: boolean;
}

@Injectable()
export class EnvironmentService {
  private readonly logger = new Logger(EnvironmentService.name);

  constructor(@Inject(XLSX_BOOST_CONFIG) private readonly config: XlsxBoostConfig) {}

  /**
   * Resolve the OS family and the variables programs launched from here should see.
   * Pure: `baseEnv` is copied, never written.
   */
  initialize(options: InitializeOptions = {}, baseEnv: EnvRecord = process.env): RuntimeEnvironment {
    const osFamily = resolveOsFamily(this.config.platform);
    const overrides: Record<string, string> = {};

    if (osFamily === 'mac') {
      // Java-based spreadsheet apps must not start AWT on macOS
      overrides['NOAWT'] = '1';
    }
    if (options.resetJavaHome ?? this.config.resetJavaHome) {
      Object.assign(overrides, this.resetRuntimeHome(baseEnv));
    }

    const names = Object.keys(overrides);
    this.logger.debug(
      `Runtime environment for ${osFamily}: ${names.length > 0 ? names.join(', ') : 'no overrides'}`,
    );
    return { osFamily, overrides, env: { ...baseEnv, ...overrides } };
  }

  /** Overrides that blank out a non-empty JAVA_HOME */
  resetRuntimeHome(baseEnv: EnvRecord = process.env): Record<string, string> {
    return baseEnv['JAVA_HOME'] ? { JAVA_HOME: '' } : {};
  }

  /** Write the overrides into `target`, for hosts that rely on process-wide variables */
  apply(environment: RuntimeEnvironment, target: EnvRecord = process.env): void {
    for (const [name, value] of Object.entries(environment.overrides)) {
      target[name] = value;
    }
  }
}
