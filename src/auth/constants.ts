export const IS_PUBLIC_KEY = 'isPublic';

// Owners double as directory names under the data directory.
export const OWNER_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
