import { ValidationError } from '../../errors.js';

const SNOWFLAKE = /^\d{17,20}$/;

export class UserId {
  private constructor(private readonly _value: string) {}

  get value(): string {
    return this._value;
  }

  /** Discord mention markup, used to credit the requester. */
  get mention(): string {
    return `<@${this._value}>`;
  }

  equals(other: UserId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }

  static from(value: string): UserId {
    if (!SNOWFLAKE.test(value)) {
      throw new ValidationError('User ID must be a valid Discord snowflake');
    }
    return new UserId(value);
  }
}
