export { validateConfig, toConfiguration, collectWarnings } from './validator';
export { ConfigFileSchema } from './schema';
export type { ConfigFile, NotifierEntry } from './schema';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
