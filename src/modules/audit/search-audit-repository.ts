import { getPostgresClient } from "../../clients/postgres.js";

export type SearchEventStatus = "completed" | "errored" | "cancelled";

export interface SearchEventInput {
  requestId: string;
  collection: string;
  query: string;
  retrievalMode: string;
  status: SearchEventStatus;
  fallbackTriggered: boolean | null;
  resultCount: number;
  errorCode: string | null;
  durationMs: number;
}

export interface SearchEventRecord extends SearchEventInput {
  id: number;
  createdAt: Date;
}

interface SearchEventRow {
  id: number;
  request_id: string;
  collection: string;
  query: string;
  retrieval_mode: string;
  status: SearchEventStatus;
  fallback_triggered: boolean | null;
  result_count: number;
  error_code: string | null;
  duration_ms: number;
  created_at: Date;
}

export interface SearchAuditRepositoryPort {
  appendSearchEvent(input: SearchEventInput): Promise<SearchEventRecord>;
  listByCollection(collection: string, limit?: number): Promise<SearchEventRecord[]>;
}

const SELECT_COLUMNS = `
  id, request_id, collection, query, retrieval_mode, status,
  fallback_triggered, result_count, error_code, duration_ms, created_at
`;

const toRecord = (row: SearchEventRow): SearchEventRecord => ({
  id: row.id,
  requestId: row.request_id,
  collection: row.collection,
  query: row.query,
  retrievalMode: row.retrieval_mode,
  status: row.status,
  fallbackTriggered: row.fallback_triggered,
  resultCount: row.result_count,
  errorCode: row.error_code,
  durationMs: row.duration_ms,
  createdAt: row.created_at
});

export class SearchAuditRepository implements SearchAuditRepositoryPort {
  async appendSearchEvent(input: SearchEventInput): Promise<SearchEventRecord> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<SearchEventRow>(
      `
        INSERT INTO search_events (
          request_id, collection, query, retrieval_mode, status,
          fallback_triggered, result_count, error_code, duration_ms
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING ${SELECT_COLUMNS}
      `,
      [
        input.requestId,
        input.collection,
        input.query,
        input.retrievalMode,
        input.status,
        input.fallbackTriggered,
        input.resultCount,
        input.errorCode,
        Math.round(input.durationMs)
      ]
    );

    return toRecord(result.rows[0]);
  }

  async listByCollection(collection: string, limit = 50): Promise<SearchEventRecord[]> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<SearchEventRow>(
      `
        SELECT ${SELECT_COLUMNS}
        FROM search_events
        WHERE collection = $1
        ORDER BY created_at DESC, id DESC
        LIMIT $2
      `,
      [collection, limit]
    );

    return result.rows.map(toRecord);
  }
}
