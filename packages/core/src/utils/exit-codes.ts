export const EXIT_GENERAL_ERROR = 1;
