import type { QueryResultRow } from 'pg'

export interface QueryOutcome<R> {
  rows: R[]
  rowCount: number | null
}

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryOutcome<R>>
}

export const toDate = (value: Date | string): Date =>
  value instanceof Date ? value : new Date(value)

export const toNullableDate = (value: Date | string | null): Date | null =>
  value === null ? null : toDate(value)
