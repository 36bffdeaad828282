/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Build an A1 address from 1-based row/col: (6, 2) → "B6"
 */
export function buildCellAddress(row: number, col: number): string {
  return `${colIndexToLetter(col - 1)}${row}`;
}
