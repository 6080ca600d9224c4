import { Pool, QueryResultRow } from 'pg'

export abstract class BaseRepository<T extends QueryResultRow> {
  constructor(
    protected readonly pool: Pool,
    protected readonly tableName: string
  ) {}

  async findById(id: number): Promise<T | null> {
    const { rows } = await this.pool.query<T>(
      `SELECT * FROM ${this.tableName} WHERE id = $1 LIMIT 1`,
      [id]
    )
    return rows[0] ?? null
  }

  async create(item: Partial<T>): Promise<T> {
    const columns = Object.keys(item).join(', ')
    const values = Object.values(item)
    const placeholders = values.map((_, i) => '$' + (i + 1)).join(', ')
    const { rows } = await this.pool.query<T>(
      `INSERT INTO ${this.tableName} (${columns}) VALUES (${placeholders}) RETURNING *`,
      values
    )
    return rows[0]
  }

  async deleteById(id: number): Promise<boolean> {
    const { rowCount } = await this.pool.query(`DELETE FROM ${this.tableName} WHERE id = $1`, [id])
    return (rowCount ?? 0) > 0
  }
}
