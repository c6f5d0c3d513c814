export * from './constants.js';
export * from './fnv1a.js';
export * from './config/environments.js';
export * from './config/default-fields.js';
export type * from './types/api.js';
export type * from './types/environment.js';
export type * from './types/field.js';
export type * from './types/form.js';
