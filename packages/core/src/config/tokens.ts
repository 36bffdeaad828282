/** Injection token for the resolved XlsxBoostConfig */
export const XLSX_BOOST_CONFIG = Symbol('XLSX_BOOST_CONFIG');

/** Injection token for the function that spawns the file-open program */
export const PROCESS_LAUNCHER = Symbol('PROCESS_LAUNCHER');
