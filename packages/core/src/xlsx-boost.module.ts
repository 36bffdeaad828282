import { Module, type DynamicModule } from '@nestjs/common';
import { PROCESS_LAUNCHER, XLSX_BOOST_CONFIG } from './config/tokens';
import { loadConfig, type XlsxBoostOptions } from './config/xlsx-boost.config';
import { EnvironmentService } from './modules/environment/environment.service';
import { FileOpenerService } from './modules/file-opener/file-opener.service';
import { spawnLauncher, type ProcessLauncher } from './modules/file-opener/process-launcher';
import { HeaderService } from './modules/header/header.service';
import { PlotService } from './modules/plot/plot.service';

export interface XlsxBoostModuleOptions extends XlsxBoostOptions {
  /** Replaces child_process.spawn for the file opener */
  launcher?: ProcessLauncher;
  /** Register the services globally */
  isGlobal?: boolean;
}

@Module({})
export class XlsxBoostModule {
  static forRoot(options: XlsxBoostModuleOptions = {}): DynamicModule {
    const { launcher, isGlobal, ...configOptions } = options;
    return {
      module: XlsxBoostModule,
      global: isGlobal ?? false,
      providers: [
        { provide: XLSX_BOOST_CONFIG, useFactory: () => loadConfig(configOptions) },
        { provide: PROCESS_LAUNCHER, useValue: launcher ?? spawnLauncher },
        EnvironmentService,
        FileOpenerService,
        HeaderService,
        PlotService,
      ],
      exports: [XLSX_BOOST_CONFIG, EnvironmentService, FileOpenerService, HeaderService, PlotService],
    };
  }
}
