export { startRowSchema, startColSchema } from './position-schema';
export { headingLevelSchema, headerOptionsSchema } from './header-schema';
export type { HeaderOptions, ParsedHeaderOptions } from './header-schema';
export { PLOT_FILE_NAME_PATTERN, plotOptionsSchema } from './plot-schema';
export type { PlotOptions, ParsedPlotOptions } from './plot-schema';
