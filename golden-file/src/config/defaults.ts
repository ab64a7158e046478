/** Environment variable that selects the mode */
export const MODE_ENV_VAR = 'EXPECTORATE';

/** The only value of `MODE_ENV_VAR` that selects overwrite mode (case-sensitive) */
export const OVERWRITE_VALUE = 'overwrite';

/** Shown with every mismatch */
export const OVERWRITE_HINT = `Set ${MODE_ENV_VAR}=${OVERWRITE_VALUE} to accept these changes.`;
