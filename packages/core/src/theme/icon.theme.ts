import { ValidationError } from '../errors.js';

const THEME_NAME = /^[a-z]+$/;

/**
 * An icon theme name that is safe to join into a filesystem path.
 *
 * The only way to get one is `IconTheme.parse` (or `IconTheme.default`), which
 * accepts lowercase ASCII letters and nothing else, so no `..`, separators or
 * other special path segments can ever reach a path join.
 */
export class IconTheme {
  static readonly DEFAULT_NAME = 'default';

  private constructor(private readonly name: string) {}

  /** Throws ValidationError unless `raw` consists only of the letters a-z. */
  static parse(raw: string): IconTheme {
    if (!THEME_NAME.test(raw)) {
      throw new ValidationError(`Theme contains invalid characters: ${JSON.stringify(raw)}`);
    }
    return new IconTheme(raw);
  }

  static default(): IconTheme {
    return new IconTheme(IconTheme.DEFAULT_NAME);
  }

  get value(): string {
    return this.name;
  }

  isDefault(): boolean {
    return this.name === IconTheme.DEFAULT_NAME;
  }

  equals(other: IconTheme): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): string {
    return this.name;
  }
}
