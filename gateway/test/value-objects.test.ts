import { describe, it, expect } from 'vitest';
import { GuildId } from '../src/domain/value-objects/guild-id.js';
import { SearchQuery } from '../src/domain/value-objects/search-query.js';
import { UserId } from '../src/domain/value-objects/user-id.js';
import { ValidationError } from '../src/errors.js';

describe('value objects', () => {
  it('accepts snowflakes and rejects anything else', () => {
    expect(GuildId.from('123456789012345678').value).toBe('123456789012345678');
    expect(GuildId.from('123456789012345678').equals(GuildId.from('123456789012345678'))).toBe(true);
    expect(() => GuildId.from('guild-1')).toThrow(ValidationError);
    expect(() => UserId.from('12345')).toThrow('User ID must be a valid Discord snowflake');
  });

  it('formats user mentions', () => {
    expect(UserId.from('223456789012345678').mention).toBe('<@223456789012345678>');
  });

  it('trims queries and unwraps suppressed links', () => {
    expect(SearchQuery.from('  some song ').value).toBe('some song');

    const link = SearchQuery.from('<https://media.example/watch?v=1&t=2>');
    expect(link.value).toBe('https://media.example/watch?v=1&t=2');
    expect(link.isUrl).toBe(true);
  });

  it('rejects empty and oversized queries', () => {
    expect(() => SearchQuery.from('   ')).toThrow(ValidationError);
    expect(() => SearchQuery.from('x'.repeat(501))).toThrow('Search query cannot exceed 500 characters.');
  });
});
