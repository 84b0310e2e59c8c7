import { ValidationError } from '../../errors.js';

const SNOWFLAKE = /^\d{17,20}$/;

/**
 * Guild ID Value Object
 * A Discord guild id (snowflake)
 */
export class GuildId {
  private constructor(private readonly _value: string) {}

  get value(): string {
    return this._value;
  }

  equals(other: GuildId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }

  static from(value: string): GuildId {
    if (!SNOWFLAKE.test(value)) {
      throw new ValidationError('Guild ID must be a valid Discord snowflake');
    }
    return new GuildId(value);
  }
}
