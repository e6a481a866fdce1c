export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * Collects WHERE conditions with numbered placeholders.
 *
 *   const where = new WhereBuilder();
 *   where.add('shop_id = ?', shopId).add('deleted_at IS NULL');
 *   pool.query(`SELECT ... ${where.toSql()}`, where.values);
 */
export class WhereBuilder {
  private readonly conditions: string[] = [];
  readonly values: unknown[] = [];

  /**
   * Each `?` in the fragment takes the next argument
   */
  add(fragment: string, ...params: unknown[]): this {
    let index = 0;
    const sql = fragment.replace(/\?/g, () => {
      if (index >= params.length) {
        throw new Error(`Missing parameter for placeholder in: ${fragment}`);
      }
      return this.param(params[index++]);
    });
    this.conditions.push(sql);
    return this;
  }

  /**
   * Registers a value and returns its placeholder, for use outside WHERE
   */
  param(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  toSql(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

/**
 * Escape LIKE wildcards in user input (backslash is the default escape)
 */
export const escapeLike = (value: string): string => value.replace(/[\\%_]/g, '\\$&');
