import { loadConfig, type XlsxBoostConfig } from './config/xlsx-boost.config';
import { EnvironmentService } from './modules/environment/environment.service';
import { FileOpenerService } from './modules/file-opener/file-opener.service';
import { spawnLauncher } from './modules/file-opener/process-launcher';
import { HeaderService } from './modules/header/header.service';
import { PlotService } from './modules/plot/plot.service';
import type { XlsxBoostModuleOptions } from './xlsx-boost.module';

export interface XlsxBoost {
  config: XlsxBoostConfig;
  environment: EnvironmentService;
  opener: FileOpenerService;
  headers: HeaderService;
  plots: PlotService;
}

/** Build the services without a Nest container */
export function createXlsxBoost(options: XlsxBoostModuleOptions = {}): XlsxBoost {
  const { launcher, ...configOptions } = options;
  const config = loadConfig(configOptions);
  const environment = new EnvironmentService(config);
  return {
    config,
    environment,
    opener: new FileOpenerService(config, environment, launcher ?? spawnLauncher),
    headers: new HeaderService(config),
    plots: new PlotService(config),
  };
}
