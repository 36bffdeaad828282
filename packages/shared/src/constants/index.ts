export { SHEET_LIMITS, HEADER_DEFAULTS, PLOT_DEFAULTS } from './limits';
export { HEADING_PRESETS } from './heading-presets';
export { NAMED_COLORS } from './named-colors';
