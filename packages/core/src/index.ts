import 'reflect-metadata';

export { XlsxBoostModule } from './xlsx-boost.module';
export type { XlsxBoostModuleOptions } from './xlsx-boost.module';
export { createXlsxBoost } from './xlsx-boost';
export type { XlsxBoost } from './xlsx-boost';
export { loadConfig } from './config/xlsx-boost.config';
export type { XlsxBoostConfig, XlsxBoostOptions } from './config/xlsx-boost.config';
export { validateEnv } from './config/env.config';
export type { EnvConfig } from './config/env.config';
export { XLSX_BOOST_CONFIG, PROCESS_LAUNCHER } from './config/tokens';
export { XlsxBoostError } from './common/errors/xlsx-boost.error';
export { EnvironmentService } from './modules/environment/environment.service';
export type { InitializeOptions } from './modules/environment/environment.service';
export { FileOpenerService } from './modules/file-opener/file-opener.service';
export { spawnLauncher } from './modules/file-opener/process-launcher';
export type { LaunchedProcess, ProcessLauncher } from './modules/file-opener/process-launcher';
export { HeaderService } from './modules/header/header.service';
export { PlotService } from './modules/plot/plot.service';
export type { PlotRenderer } from './modules/plot/plot.service';
export type {
  HeaderOptions,
  HeaderPlacement,
  HeadingLevel,
  HeadingStyle,
  PlotOptions,
  PlotPlacement,
  RuntimeEnvironment,
} from '@xlsxboost/shared';
