/**
 * backend/src/modules/tokens/token.constants.ts
 */

/** 128 bits of randomness per token. */
export const TOKEN_BYTES = 16;

/** base32 of 16 bytes, padding stripped. */
export const TOKEN_LENGTH = 26;

export const TOKEN_PATTERN = /^[A-Z2-7]{26}$/;

export const HOUR_MS = 60 * 60 * 1000;
