export const EXIT_OK = 0;
/** No solution found, or verification failed */
export const EXIT_FAILED = 1;
/** Any thrown error: parse, encoding, config, generation limit or I/O */
export const EXIT_ERROR = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILED | typeof EXIT_ERROR;
