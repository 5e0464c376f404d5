/**
 * Error types raised by the daiji conversion core.
 */

/**
 * The input is not a numeral the normalizer accepts.
 */
export class MalformedNumeralError extends Error {
  public readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = 'MalformedNumeralError';
    this.input = input;
    Object.setPrototypeOf(this, MalformedNumeralError.prototype);
  }
}

/**
 * A conversion table or flag was given an unusable value.
 */
export class ConfigurationError extends Error {
  public readonly setting: string;

  constructor(message: string, setting: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.setting = setting;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A 4-digit group needs a large-unit name the table does not have.
 */
export class LargeUnitOverflowError extends Error {
  public readonly groupIndex: number;
  public readonly tableSize: number;

  constructor(groupIndex: number, tableSize: number) {
    super(
      `No large unit name for 4-digit group ${groupIndex} ` +
        `(the table defines ${tableSize} names)`
    );
    this.name = 'LargeUnitOverflowError';
    this.groupIndex = groupIndex;
    this.tableSize = tableSize;
    Object.setPrototypeOf(this, LargeUnitOverflowError.prototype);
  }
}
