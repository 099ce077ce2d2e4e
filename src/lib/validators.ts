import validator from 'validator';

/**
 * Validate an unquoted SQL identifier (letters, digits, underscore)
 */
export function isSafeIdentifier(name: string): boolean {
  return validator.isAlphanumeric(name, 'en-US', { ignore: '_' });
}

/**
 * Validate identifier for Inquirer prompt
 */
export function validateIdentifier(input: string): boolean | string {
  if (!input.trim()) {
    return 'Name is required';
  }

  if (!isSafeIdentifier(input.trim())) {
    return 'Use only letters, digits and underscores';
  }

  return true;
}

/**
 * Validate a non-empty string
 */
export function validateRequired(fieldName: string) {
  return (input: string): boolean | string => {
    if (!input.trim()) {
      return `${fieldName} is required`;
    }
    return true;
  };
}

/**
 * Validate a positive integer given as text
 */
export function isPositiveInteger(input: string): boolean {
  return validator.isInt(input.trim(), { min: 1 });
}

/**
 * Validate a URL
 */
export function isValidUrl(url: string): boolean {
  return validator.isURL(url, {
    protocols: ['http', 'https'],
    require_protocol: true,
    require_tld: false, // Allow localhost
  });
}

/**
 * Validate URL for Inquirer prompt
 */
export function validateUrl(input: string): boolean | string {
  if (!input.trim()) {
    return 'URL is required';
  }

  if (!isValidUrl(input)) {
    return 'Please enter a valid URL (http:// or https://)';
  }

  return true;
}

/**
 * Normalize URL (remove trailing slashes)
 */
export function normalizeUrl(url: string): string {
  let normalized = url.trim();
  while (normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}
