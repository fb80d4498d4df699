export type ValidationResult = { ok: true } | { ok: false; reason: string };

export const MAX_APP_NAME_LENGTH = 64;
export const MAX_SESSION_ID_LENGTH = 128;
export const MAX_RESOURCE_ID_LENGTH = 128;
export const MAX_INPUT_BYTES = 100 * 1024;

const IDENTIFIER_PATTERN = /^[\p{L}\p{N}_-]+$/u;

const VALID: ValidationResult = { ok: true };

function reject(reason: string): ValidationResult {
  return { ok: false, reason };
}

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Length in code points, so a name made of astral characters is not
 * penalised for its UTF-16 surrogate pairs.
 */
function characterLength(value: string): number {
  return [...value].length;
}

function validateIdentifier(field: string, value: unknown, maxLength: number): ValidationResult {
  if (isEmpty(value)) {
    return reject(`Invalid ${field}: must not be empty`);
  }
  if (typeof value !== 'string') {
    return reject(`Invalid ${field}: must be a string`);
  }
  if (characterLength(value) > maxLength) {
    return reject(`Invalid ${field}: exceeds maximum length of ${maxLength} characters`);
  }
  if (!IDENTIFIER_PATTERN.test(value)) {
    return reject(`Invalid ${field}: contains invalid characters`);
  }
  return VALID;
}

export function validateInputText(inputText: unknown): ValidationResult {
  if (isEmpty(inputText)) {
    return reject('Invalid input: must not be empty');
  }
  if (typeof inputText !== 'string') {
    return reject('Invalid input: must be a string');
  }
  if (Buffer.byteLength(inputText, 'utf8') > MAX_INPUT_BYTES) {
    return reject('Invalid input: exceeds maximum size of 100KB');
  }
  return VALID;
}

/**
 * Validate the three caller-supplied fields of a request.
 * Fields are checked in order (app name, input, session) and each field's
 * rules in order (emptiness, type, size, charset); the first failure wins.
 */
export function validateRequest(appName: unknown, inputText: unknown, sessionId: unknown): ValidationResult {
  const appCheck = validateIdentifier('app_name', appName, MAX_APP_NAME_LENGTH);
  if (!appCheck.ok) return appCheck;

  const inputCheck = validateInputText(inputText);
  if (!inputCheck.ok) return inputCheck;

  return validateIdentifier('session_id', sessionId, MAX_SESSION_ID_LENGTH);
}

/**
 * Agent and model ids only need to be present and bounded; their format is
 * the backend's business.
 */
export function validateResourceId(kind: 'agent_id' | 'model_id', value: unknown): ValidationResult {
  if (typeof value !== 'string' || value.length === 0 || value.length > MAX_RESOURCE_ID_LENGTH) {
    return reject(`Invalid ${kind}`);
  }
  return VALID;
}
