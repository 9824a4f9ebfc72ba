/**
 * Lexer Errors
 */

import { TernError } from '../types.js';
import type { SourceLocation, TernErrorCode } from '../types.js';

export class LexerError extends TernError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    code: TernErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
