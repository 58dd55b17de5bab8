import mysql, { Pool, RowDataPacket } from "mysql2/promise";
import { AppConfig } from "../config/index.js";
import { childLogger } from "../observability/logger.js";
import type { RawDocument } from "../records/types.js";

const log = childLogger("mysql");

export function createPool(config: AppConfig): Pool {
  return mysql.createPool({
    host: config.mysql.host,
    port: config.mysql.port,
    user: config.mysql.user,
    password: config.mysql.password,
    database: config.mysql.database,
    connectionLimit: 4,
    waitForConnections: true,
    queueLimit: 0
  });
}

export interface DocumentRow extends RowDataPacket {
  id: string;
  // JSON columns come back parsed; TEXT columns holding JSON come back as strings
  document: unknown;
}

/**
 * A document that does not parse is handed on as `null`; the mappers then
 * count it like any other record without a UID.
 */
export function parseDocument(id: string, raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  if (raw.trim() === "") return null;
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.warn({ id, err }, "Document is not valid JSON");
    return null;
  }
}

export async function fetchDocumentPage(
  pool: Pool,
  table: string,
  afterId: string | null,
  batchSize: number
): Promise<DocumentRow[]> {
  const where = afterId !== null ? "WHERE `id` > ?" : "";
  const sql = `SELECT \`id\`, \`document\` FROM \`${table}\` ${where} ORDER BY \`id\` LIMIT ?`;
  const params: Array<string | number> = [];
  if (afterId !== null) params.push(afterId);
  params.push(batchSize);
  const [rows] = await pool.query<DocumentRow[]>(sql, params);
  return rows;
}

/**
 * Reads every document of a table, one keyset page at a time, ordered by id.
 */
export async function fetchAllDocuments(pool: Pool, table: string, batchSize: number): Promise<RawDocument[]> {
  const documents: RawDocument[] = [];
  let afterId: string | null = null;

  for (;;) {
    const rows = await fetchDocumentPage(pool, table, afterId, batchSize);
    for (const row of rows) {
      const id = String(row.id);
      documents.push({ id, data: parseDocument(id, row.document) });
    }
    const last = rows[rows.length - 1];
    if (!last || rows.length < batchSize) break;
    afterId = String(last.id);
  }

  return documents;
}
