/**
 * Symbols accepted as the required special character of a password
 */
export const PASSWORD_SPECIAL_CHARACTERS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

export const PASSWORD_MIN_LENGTH = 8;

export const NOTE_TITLE_MAX_LENGTH = 255;

/**
 * Characters of content shown in note list views
 */
export const NOTE_PREVIEW_LENGTH = 100;

export const PAGE_SIZE_DEFAULT = 10;
export const PAGE_SIZE_MAX = 100;

/**
 * Upper bounds on `skip` and `page` that keep row offsets exact integers
 */
export const SKIP_MAX = Number.MAX_SAFE_INTEGER - PAGE_SIZE_MAX;
export const PAGE_NUMBER_MAX = Math.floor(SKIP_MAX / PAGE_SIZE_MAX) + 1;
