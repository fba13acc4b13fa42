/**
 * Splits a Common Log Format line into its nine fields
 *
 * Log format (nginx "combined" without the referer):
 * %h %l %u [%d/%b/%Y:%H:%M:%S %z] "%r" %>s %b "%{User-Agent}i"
 *
 * Example line:
 * 10.151.160.7 - - [10/Oct/2000:13:55:36 -0700] "GET /admin.php HTTP/1.1" 200 2326 "curl/7.81.0"
 */

import { FieldCountError } from '../errors';
import { FieldSet } from '../types';
import { tokenize } from './tokenizer';

export const CLF_FIELD_COUNT = 9;

/**
 * Parses a raw log line into a field set
 *
 * @param line - Raw line, trailing newline allowed
 * @throws MalformedLineError when quoting is unbalanced
 * @throws FieldCountError when the line does not split into exactly nine tokens
 */
export function parseLine(line: string): FieldSet {
  const tokens = tokenize(line);
  if (tokens.length !== CLF_FIELD_COUNT) {
    throw new FieldCountError(tokens.length, CLF_FIELD_COUNT);
  }

  const [address, identity, userid, date, timezone, request, status, size, agent] = tokens;

  return { address, identity, userid, date, timezone, request, status, size, agent };
}
