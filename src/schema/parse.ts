// Text notation for types, as written in chain declaration files:
//   float | sequence<T> | T[] | array<float>[*, 3] | mapping<string, T> | opaque<Label> | record{a: T, b: T}
import type { Dimension, ScalarKind, TypeSpec } from "../types/schema.js";
import { MalformedContractError } from "../errors.js";
import { isScalarKind, mapping, opaque, record, scalar, sequence, shapedArray } from "./types.js";

const IDENT = /[A-Za-z_$][\w$.-]*/y;
const INT = /\d+/y;

class Parser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parse(): TypeSpec {
    const type = this.type();
    this.skipSpace();
    if (this.pos < this.src.length) this.fail("end of input");
    return type;
  }

  private type(): TypeSpec {
    let type = this.base();
    // `T[]` is sugar for sequence<T>
    while (this.peek("[")) {
      const save = this.pos;
      this.pos += 1;
      if (!this.accept("]")) {
        this.pos = save;
        break;
      }
      type = sequence(type);
    }
    return type;
  }

  private base(): TypeSpec {
    const start = this.pos;
    const word = this.ident();
    switch (word) {
      case "sequence": {
        this.expect("<");
        const element = this.type();
        this.expect(">");
        return sequence(element);
      }
      case "array": {
        this.expect("<");
        const element = this.scalarKind();
        this.expect(">");
        this.expect("[");
        const dims: Dimension[] = [];
        if (!this.peek("]")) {
          do {
            dims.push(this.dimension());
          } while (this.accept(","));
        }
        this.expect("]");
        return this.build(() => shapedArray(element, dims));
      }
      case "mapping": {
        this.expect("<");
        const key = this.scalarKind();
        this.expect(",");
        const value = this.type();
        this.expect(">");
        return mapping(key, value);
      }
      case "opaque": {
        this.expect("<");
        const label = this.ident();
        this.expect(">");
        return opaque(label);
      }
      case "record": {
        this.expect("{");
        const fields: Record<string, TypeSpec> = {};
        if (!this.peek("}")) {
          do {
            const name = this.ident();
            if (Object.hasOwn(fields, name)) this.fail(`a field name other than '${name}' (duplicate)`);
            this.expect(":");
            fields[name] = this.type();
          } while (this.accept(","));
        }
        this.expect("}");
        return record(fields);
      }
      default:
        if (isScalarKind(word)) return scalar(word);
        this.pos = start;
        this.fail("a scalar kind or one of sequence, array, mapping, opaque, record");
    }
  }

  private scalarKind(): ScalarKind {
    const start = this.pos;
    const word = this.ident();
    if (!isScalarKind(word)) {
      this.pos = start;
      this.fail("a scalar kind");
    }
    return word;
  }

  private dimension(): Dimension {
    if (this.accept("*")) return null;
    this.skipSpace();
    INT.lastIndex = this.pos;
    const m = INT.exec(this.src);
    if (!m) this.fail("a dimension size or *");
    this.pos += m[0].length;
    return Number(m[0]);
  }

  private ident(): string {
    this.skipSpace();
    IDENT.lastIndex = this.pos;
    const m = IDENT.exec(this.src);
    if (!m) this.fail("a name");
    this.pos += m[0].length;
    return m[0];
  }

  private build(make: () => TypeSpec): TypeSpec {
    try {
      return make();
    } catch (e) {
      if (e instanceof MalformedContractError) this.fail(e.message, true);
      throw e;
    }
  }

  private skipSpace() {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos])) this.pos++;
  }

  private peek(token: string): boolean {
    this.skipSpace();
    return this.src.startsWith(token, this.pos);
  }

  private accept(token: string): boolean {
    if (!this.peek(token)) return false;
    this.pos += token.length;
    return true;
  }

  private expect(token: string) {
    if (!this.accept(token)) this.fail(`'${token}'`);
  }

  private fail(expected: string, raw = false): never {
    const detail = raw ? expected : `expected ${expected}`;
    throw new MalformedContractError(`cannot parse type ${JSON.stringify(this.src)} at offset ${this.pos}: ${detail}`);
  }
}

export function parseType(notation: string): TypeSpec {
  return new Parser(notation).parse();
}
