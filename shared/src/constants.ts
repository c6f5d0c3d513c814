// API path prefixes
export const API_PATHS = {
  HEALTH: '/health',
  FORM: '/form',
} as const;

// Sigil handshake wire contract. The browser must reproduce these exactly.
export const SIGIL = {
  DEFAULT_NAME: 'sigil',
  TIME_SUFFIX: '_time',
  PROOF_PREFIX: 'tck_',
  PLACEHOLDER_BYTES: 8,
} as const;

// Field naming
export const FIELD = {
  NAME_PATTERN: /^[a-z\d_-]+$/i,
  WIRE_ID_PREFIX: 'ID',
  DEFAULT_INPUT_TYPE: 'text',
  HIDDEN_INPUT_TYPE: 'hidden',
  BUCKET_SECONDS: 3600,
} as const;

// Error messages
export const ERRORS = {
  FORBIDDEN: 'Forbidden',
  NOT_FOUND: 'Not found',
  UNKNOWN_FORM: 'Unknown form',
  INVALID_BODY: 'Invalid request body',
  MISSING_FIELDS: 'Required fields are missing',
  INTERNAL: 'Internal server error',
} as const;
