export { colIndexToLetter, buildCellAddress } from './cell-utils';
export { resolveHeadingColor, colorToArgb, argbToCss, isPlotBackground } from './color-utils';
export { resolveInsertionPosition } from './position-utils';
export { isHeadingLevel } from './heading-utils';
export { resolveOsFamily, buildOpenCommand } from './platform-utils';
