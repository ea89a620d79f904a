/**
 * Process exit codes for the taskrunner CLI. Distinct codes let scripts tell
 * an invalid document apart from a failing task.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_DOCUMENT_INVALID = 2;
export const EXIT_TASK_FAILED = 3;
export const EXIT_SIGINT = 130; // 128 + SIGINT(2)
export const EXIT_SIGTERM = 143; // 128 + SIGTERM(15)
