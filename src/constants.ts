// Number of terms computed per page
export const DEFAULT_PAGE_SIZE = 5;

// Word width terms are checked against (bits)
export const DEFAULT_BIT_WIDTH = 64;

// Widest word the engine accepts (bits)
export const MAX_BIT_WIDTH = 64;

// Title passed to the error reporter on overflow
export const ERROR_TITLE = 'Error';
