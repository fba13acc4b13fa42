/**
 * Validators for the individual fields of a CLF line
 *
 * Each validator is pure and returns a tagged result; values derived on
 * success (normalized address, decoded path, response size) ride along in it.
 */

import { isValid, parse } from 'date-fns';
import { MalformedLineError } from '../errors';
import { FieldResult } from '../types';
import { tokenize } from './tokenizer';

export { validateUserAgent } from './user-agent';

const DIGITS = /^[0-9]+$/;

/**
 * HTTP methods accepted in the request line (case-sensitive)
 */
export const HTTP_METHODS: ReadonlySet<string> = new Set([
  'OPTIONS',
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'TRACE',
  'CONNECT',
  'PATCH',
]);

/**
 * date-fns pattern for the bracket-stripped CLF timestamp, e.g. `10/Oct/2000:13:55:36 -0700`
 *
 * The offset must be a sign and four digits with no colon; `-07:00` is rejected.
 */
export const TIMESTAMP_PATTERN = 'dd/MMM/yyyy:HH:mm:ss xx';

/**
 * Validates a dotted-quad IPv4 address
 *
 * @param token - Address field, e.g. "10.151.160.7"
 * @returns The address with leading zeros removed from each octet
 */
export function validateClientAddress(token: string): FieldResult<string> {
  const octets = token.split('.');
  if (octets.length !== 4) {
    return {
      success: false,
      reason: 'address-invalid',
      message: `Expected 4 octets but found ${octets.length}`,
    };
  }

  const normalized: number[] = [];
  for (const octet of octets) {
    if (!DIGITS.test(octet)) {
      return { success: false, reason: 'address-invalid', message: `Octet is not numeric: "${octet}"` };
    }
    const value = parseInt(octet, 10);
    if (value > 255) {
      return { success: false, reason: 'address-invalid', message: `Octet out of range: ${value}` };
    }
    normalized.push(value);
  }

  return { success: true, value: normalized.join('.') };
}

/**
 * Validates the bracketed timestamp, which the tokenizer splits in two
 *
 * @param dateToken - e.g. "[10/Oct/2000:13:55:36"
 * @param zoneToken - e.g. "-0700]"
 * @returns The parsed instant
 */
export function validateTimestamp(dateToken: string, zoneToken: string): FieldResult<Date> {
  const combined = `${dateToken} ${zoneToken}`;
  if (!combined.startsWith('[') || !combined.endsWith(']')) {
    return {
      success: false,
      reason: 'timestamp-invalid',
      message: `Timestamp not enclosed in square brackets: ${combined}`,
    };
  }

  const content = combined.slice(1, -1);
  const parsed = parse(content, TIMESTAMP_PATTERN, new Date(0));
  if (!isValid(parsed)) {
    return {
      success: false,
      reason: 'timestamp-invalid',
      message: `Timestamp does not match ${TIMESTAMP_PATTERN}: ${content}`,
    };
  }

  return { success: true, value: parsed };
}

/**
 * Percent-decodes a resource path
 *
 * Escapes that are not two hex digits are left as they are, and byte
 * sequences that are not valid UTF-8 decode to U+FFFD.
 */
export function decodeResourcePath(path: string): string {
  return path.replace(/(?:%[0-9A-Fa-f]{2})+/g, run => {
    const bytes = run
      .slice(1)
      .split('%')
      .map(hex => parseInt(hex, 16));
    return Buffer.from(bytes).toString('utf8');
  });
}

/**
 * Validates an HTTP request line such as `GET /admin.php HTTP/1.1`
 *
 * @returns The percent-decoded resource path
 */
export function validateRequestLine(token: string): FieldResult<string> {
  let parts: string[];
  try {
    parts = tokenize(token);
  } catch (error) {
    if (error instanceof MalformedLineError) {
      return { success: false, reason: 'request-invalid', message: error.message };
    }
    throw error;
  }

  if (parts.length !== 3) {
    return {
      success: false,
      reason: 'request-invalid',
      message: `Expected method, path and protocol but found ${parts.length} parts`,
    };
  }

  const [method, rawPath, protocol] = parts;

  if (!HTTP_METHODS.has(method)) {
    return { success: false, reason: 'request-invalid', message: `Unknown HTTP method: ${method}` };
  }

  if (!isHttpProtocol(protocol)) {
    return {
      success: false,
      reason: 'request-invalid',
      message: `Protocol is not HTTP/<major>.<minor>: ${protocol}`,
    };
  }

  return { success: true, value: decodeResourcePath(rawPath) };
}

function isHttpProtocol(protocol: string): boolean {
  const protocolParts = protocol.split('/');
  if (protocolParts.length !== 2 || protocolParts[0] !== 'HTTP') {
    return false;
  }
  const version = protocolParts[1].split('.');
  return version.length === 2 && DIGITS.test(version[0]) && DIGITS.test(version[1]);
}

/**
 * Validates a response status: three digits, first in 2-5
 */
export function validateStatusCode(token: string): FieldResult<number> {
  if (!/^[2-5][0-9]{2}$/.test(token)) {
    return { success: false, reason: 'status-invalid', message: `Invalid status code: ${token}` };
  }
  return { success: true, value: parseInt(token, 10) };
}

/**
 * Validates the response size in bytes
 */
export function validateResponseSize(token: string): FieldResult<number> {
  if (!DIGITS.test(token)) {
    return { success: false, reason: 'size-invalid', message: `Response size is not numeric: ${token}` };
  }
  return { success: true, value: Number(token) };
}
