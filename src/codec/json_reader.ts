/**
 * JSON reader: minimal recursive-descent parser for server envelopes.
 *
 * Grammar: object, array, string (with escapes), number, true, false, null.
 *
 * readArrayLenient() is the reason this exists: a listing response is read
 * element by element, and an element that fails to parse is skipped up to
 * the next top-level ',' or ']' instead of failing the whole batch.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export class JsonSyntaxError extends Error {
  public readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'JsonSyntaxError';
    this.position = position;
  }
}

export interface LenientArray {
  elements: JsonValue[];
  /** Number of elements dropped because they did not parse. */
  skipped: number;
}

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t'
};

export class JsonReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  /** Parse the whole text as one JSON value. Trailing content is an error. */
  readDocument(): JsonValue {
    const value = this.readValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw new JsonSyntaxError('Unexpected trailing content', this.pos);
    }
    return value;
  }

  /**
   * Read an array starting at `start` (which must hold '['), dropping
   * elements that fail to parse.
   */
  readArrayLenient(start = 0): LenientArray {
    this.pos = start;
    this.skipWhitespace();
    this.expect('[');

    const elements: JsonValue[] = [];
    let skipped = 0;

    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos += 1;
      return { elements, skipped };
    }

    while (this.pos < this.text.length) {
      this.skipWhitespace();
      if (this.peek() === ']') {
        // trailing comma
        this.pos += 1;
        break;
      }

      const elementStart = this.pos;
      let value: JsonValue | undefined;
      try {
        value = this.readValue();
        this.skipWhitespace();
        const next = this.peek();
        if (next !== ',' && next !== ']' && next !== undefined) {
          value = undefined;
        }
      } catch (err) {
        if (!(err instanceof JsonSyntaxError)) throw err;
        value = undefined;
      }

      if (value === undefined) {
        skipped += 1;
        this.pos = this.findElementBoundary(elementStart);
      } else {
        elements.push(value);
      }

      const separator = this.peek();
      if (separator === ',') {
        this.pos += 1;
        continue;
      }
      if (separator === ']') this.pos += 1;
      break;
    }

    return { elements, skipped };
  }

  private readValue(): JsonValue {
    this.skipWhitespace();
    const ch = this.peek();
    switch (ch) {
      case '{':
        return this.readObject();
      case '[':
        return this.readArray();
      case '"':
        return this.readString();
      case 't':
        return this.readLiteral('true', true);
      case 'f':
        return this.readLiteral('false', false);
      case 'n':
        return this.readLiteral('null', null);
      default:
        if (ch === '-' || (ch !== undefined && ch >= '0' && ch <= '9')) {
          return this.readNumber();
        }
        throw new JsonSyntaxError(ch === undefined ? 'Unexpected end of input' : `Unexpected character '${ch}'`, this.pos);
    }
  }

  private readObject(): JsonObject {
    this.expect('{');
    const obj: JsonObject = {};
    this.skipWhitespace();
    if (this.peek() === '}') {
      this.pos += 1;
      return obj;
    }

    for (;;) {
      this.skipWhitespace();
      if (this.peek() !== '"') {
        throw new JsonSyntaxError('Expected object key', this.pos);
      }
      const key = this.readString();
      this.skipWhitespace();
      this.expect(':');
      const value = this.readValue();
      // defineProperty so a "__proto__" key stays a plain own property
      Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos += 1;
        continue;
      }
      if (next === '}') {
        this.pos += 1;
        return obj;
      }
      throw new JsonSyntaxError("Expected ',' or '}'", this.pos);
    }
  }

  private readArray(): JsonValue[] {
    this.expect('[');
    const items: JsonValue[] = [];
    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos += 1;
      return items;
    }

    for (;;) {
      items.push(this.readValue());
      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos += 1;
        continue;
      }
      if (next === ']') {
        this.pos += 1;
        return items;
      }
      throw new JsonSyntaxError("Expected ',' or ']'", this.pos);
    }
  }

  private readString(): string {
    this.expect('"');
    let out = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '"') {
        this.pos += 1;
        return out;
      }
      if (ch === '\\') {
        const esc = this.text[this.pos + 1];
        if (esc === 'u') {
          const hex = this.text.slice(this.pos + 2, this.pos + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw new JsonSyntaxError('Invalid unicode escape', this.pos);
          }
          out += String.fromCharCode(parseInt(hex, 16));
          this.pos += 6;
          continue;
        }
        const simple = esc === undefined ? undefined : SIMPLE_ESCAPES[esc];
        if (simple === undefined) {
          throw new JsonSyntaxError('Invalid escape', this.pos);
        }
        out += simple;
        this.pos += 2;
        continue;
      }
      if (ch !== undefined && ch < ' ') {
        throw new JsonSyntaxError('Control character in string', this.pos);
      }
      out += ch;
      this.pos += 1;
    }
    throw new JsonSyntaxError('Unterminated string', this.pos);
  }

  private readNumber(): number {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) {
      throw new JsonSyntaxError('Invalid number', this.pos);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private readLiteral<T extends JsonValue>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.pos)) {
      throw new JsonSyntaxError(`Expected '${word}'`, this.pos);
    }
    this.pos += word.length;
    return value;
  }

  /**
   * Scan from `from` to the next ',' or ']' that is not nested inside a
   * string, object or array. Returns text.length when there is none.
   */
  private findElementBoundary(from: number): number {
    let depth = 0;
    let inString = false;
    for (let i = from; i < this.text.length; i++) {
      const ch = this.text[i];
      if (inString) {
        if (ch === '\\') i += 1;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{' || ch === '[') depth += 1;
      else if (ch === '}') depth = Math.max(0, depth - 1);
      else if (ch === ']') {
        if (depth === 0) return i;
        depth -= 1;
      } else if (ch === ',' && depth === 0) return i;
    }
    return this.text.length;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      throw new JsonSyntaxError(`Expected '${ch}'`, this.pos);
    }
    this.pos += 1;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch !== ' ' && ch !== '\n' && ch !== '\r' && ch !== '\t') return;
      this.pos += 1;
    }
  }
}

export function readJson(text: string): JsonValue {
  return new JsonReader(text).readDocument();
}

/** readJson that returns undefined instead of throwing. */
export function tryReadJson(text: string): JsonValue | undefined {
  try {
    return readJson(text);
  } catch (err) {
    if (err instanceof JsonSyntaxError) return undefined;
    throw err;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
