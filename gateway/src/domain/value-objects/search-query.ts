import { ValidationError } from '../../errors.js';

export const MAX_QUERY_LENGTH = 500;

/**
 * Search Query Value Object
 * Free text or a URL, as typed after the play command
 */
export class SearchQuery {
  private constructor(private readonly _value: string) {}

  get value(): string {
    return this._value;
  }

  get isUrl(): boolean {
    return /^https?:\/\//i.test(this._value);
  }

  equals(other: SearchQuery): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }

  static from(value: string): SearchQuery {
    // Discord wraps links in <> to suppress embeds
    const trimmed = value.trim().replace(/^<(https?:\/\/[^>]+)>$/i, '$1');
    if (trimmed.length === 0) {
      throw new ValidationError('Tell me what to play: a song name or a link.');
    }
    if (trimmed.length > MAX_QUERY_LENGTH) {
      throw new ValidationError(`Search query cannot exceed ${MAX_QUERY_LENGTH} characters.`);
    }
    return new SearchQuery(trimmed);
  }
}
