export { deriveNames, validateName, splitName, capitalize, isValidIdentifier } from './names.js';
export type { NameForms } from './names.js';
