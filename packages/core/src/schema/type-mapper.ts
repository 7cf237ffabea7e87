/**
 * Type Mapper
 *
 * Converts abstract column types (pk, string, integer, ...) into the
 * physical types of a dialect.
 *
 * - `string`            -> the mapped template, e.g. `varchar(255)`
 * - `string(32)`        -> the template with its length replaced, `varchar(32)`
 * - `string NOT NULL`   -> only the leading word converted, `varchar(255) NOT NULL`
 *
 * Anything not found in the map is returned unchanged.
 */

export type TypeMap = Readonly<Record<string, string>>;

const SIZED_TYPE = /^(\w+)\((.+?)\)(.*)$/;
const QUALIFIED_TYPE = /^(\w+)\s+/;
const TEMPLATE_SIZE = /\(.+\)/;
const LEADING_WORD = /^\w+/;

export class TypeMapper {
  private readonly types: ReadonlyMap<string, string>;

  constructor(typeMap: TypeMap) {
    this.types = new Map(Object.entries(typeMap));
  }

  resolve(type: string): string {
    const exact = this.types.get(type);
    if (exact !== undefined) {
      return exact;
    }

    const sized = SIZED_TYPE.exec(type);
    if (sized) {
      const [, name = '', size = '', trailing = ''] = sized;
      const template = this.types.get(name);
      if (template === undefined) {
        return type;
      }
      return template.replace(TEMPLATE_SIZE, () => `(${size})`) + trailing;
    }

    const qualified = QUALIFIED_TYPE.exec(type);
    if (qualified) {
      const template = this.types.get(qualified[1] ?? '');
      if (template !== undefined) {
        return type.replace(LEADING_WORD, () => template);
      }
    }

    return type;
  }

  has(type: string): boolean {
    return this.types.has(type);
  }
}
