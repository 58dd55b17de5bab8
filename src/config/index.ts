import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  PORT: z.string().optional(),

  MYSQL_HOST: z.string().optional(),
  MYSQL_PORT: z.string().optional(),
  MYSQL_USER: z.string().optional(),
  MYSQL_PASSWORD: z.string().optional(),
  MYSQL_DATABASE: z.string().optional(),

  BABY_TABLE: z.string().optional(),
  BABY_BACKUP_TABLE: z.string().optional(),
  DISCHARGES_TABLE: z.string().optional(),

  FETCH_BATCH_SIZE: z.string().optional(),
  FETCH_MAX_RETRIES: z.string().optional(),
  FETCH_RETRY_DELAY_MS: z.string().optional(),
  SNAPSHOT_TTL_MS: z.string().optional(),
  EXCLUDED_HOSPITAL_TERMS: z.string().optional(),
});

export type EnvInput = Record<string, string | undefined>;

export type AppConfig = {
  port: number;
  mysql: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
  collections: {
    baby: string;
    babyBackUp: string;
    discharges: string;
  };
  ops: {
    fetchBatchSize: number;
    fetchMaxRetries: number;
    fetchRetryDelayMs: number;
    snapshotTtlMs: number;
    excludedHospitalTerms: string[];
  };
};

function toPositiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

function parseTerms(raw: string | undefined): string[] {
  if (raw === undefined) return ["test", "training", "demo"];
  return raw
    .split(",")
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0);
}

export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: toPositiveInt(parsed.PORT, 3000, "PORT"),
    mysql: {
      host: parsed.MYSQL_HOST ?? "localhost",
      port: toPositiveInt(parsed.MYSQL_PORT, 3306, "MYSQL_PORT"),
      user: parsed.MYSQL_USER ?? "root",
      password: parsed.MYSQL_PASSWORD ?? "",
      database: parsed.MYSQL_DATABASE ?? "kmc",
    },
    collections: {
      baby: parsed.BABY_TABLE ?? "baby",
      babyBackUp: parsed.BABY_BACKUP_TABLE ?? "baby_backup",
      discharges: parsed.DISCHARGES_TABLE ?? "discharges",
    },
    ops: {
      fetchBatchSize: toPositiveInt(parsed.FETCH_BATCH_SIZE, 500, "FETCH_BATCH_SIZE") || 500,
      fetchMaxRetries: toPositiveInt(parsed.FETCH_MAX_RETRIES, 3, "FETCH_MAX_RETRIES") || 1,
      fetchRetryDelayMs: toPositiveInt(parsed.FETCH_RETRY_DELAY_MS, 1000, "FETCH_RETRY_DELAY_MS"),
      snapshotTtlMs: toPositiveInt(parsed.SNAPSHOT_TTL_MS, 300000, "SNAPSHOT_TTL_MS"),
      excludedHospitalTerms: parseTerms(parsed.EXCLUDED_HOSPITAL_TERMS),
    },
  };
}
