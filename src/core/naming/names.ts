/**
 * Name derivation for generated Dart code.
 *
 * A free-form name such as "product_catalog", "Product Catalog" or
 * "product-catalog" is split on separator characters (underscore, hyphen,
 * dot, whitespace) and at lower-to-upper case boundaries, so "userProfile"
 * and "user_profile" name the same thing. Empty segments are dropped.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

export interface NameForms {
  /** The name as given */
  source: string;
  /** lowerCamelCase: first segment lower-cased, others capitalized */
  identifier: string;
  /** UpperCamelCase, used for class names */
  pascal: string;
  /** lower_snake_case, used for file and directory names */
  snake: string;
  /** "/" + snake form */
  path: string;
  /** Route name, equal to the snake form */
  routeName: string;
}

const SEPARATORS = /[\s_.\-]+/;
const CASE_BOUNDARY = /([a-z0-9])([A-Z])/g;

/** Generated identifier: letter or underscore, then word characters. */
const DART_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function splitName(name: string): string[] {
  return name
    .replace(CASE_BOUNDARY, '$1_$2')
    .split(SEPARATORS)
    .filter((segment) => segment.length > 0);
}

export function capitalize(segment: string): string {
  if (segment.length === 0) return segment;
  return segment[0].toUpperCase() + segment.slice(1).toLowerCase();
}

/**
 * Derive every name form. Total: any input yields a result, possibly with
 * empty forms; use {@link validateName} before generating code from it.
 */
export function deriveNames(name: string): NameForms {
  const segments = splitName(name);
  const [first = '', ...rest] = segments;

  const identifier = first.toLowerCase() + rest.map(capitalize).join('');
  const snake = segments.map((s) => s.toLowerCase()).join('_');

  return {
    source: name,
    identifier,
    pascal: segments.map(capitalize).join(''),
    snake,
    path: `/${snake}`,
    routeName: snake,
  };
}

export function isValidIdentifier(candidate: string): boolean {
  return DART_IDENTIFIER.test(candidate);
}

/**
 * Derive name forms and reject names that do not produce a usable
 * identifier or file name.
 *
 * @throws ValidationError when the derived identifier is empty or invalid
 */
export function validateName(name: string): NameForms {
  const forms = deriveNames(name);

  if (forms.identifier.length === 0) {
    throw new ValidationError(ErrorCodes.INVALID_NAME, `Name "${name}" is empty after normalization`, { name });
  }

  if (!isValidIdentifier(forms.identifier) || !isValidIdentifier(forms.pascal)) {
    throw new ValidationError(
      ErrorCodes.INVALID_NAME,
      `Name "${name}" does not produce a valid identifier (got "${forms.identifier}")`,
      { name, identifier: forms.identifier }
    );
  }

  return forms;
}
