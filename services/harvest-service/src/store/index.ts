import IORedis, { RedisOptions } from "ioredis";
import { z } from "zod";
import { Table, TableStore } from "../interfaces/ledger";
import { LEDGER_KEY_PREFIX } from "../constants/ledger";
import { LedgerUnavailableError } from "../errors";
import { logger } from "../logger";

/** The subset of the Valkey client the table store needs */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

const TableSchema = z.array(z.array(z.string()));

export function tableKey(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${LEDGER_KEY_PREFIX}:${slug}`;
}

/**
 * Named tables kept as JSON-encoded rows in Valkey.
 * Read and write failures surface as LedgerUnavailableError.
 */
export class ValkeyTableStore implements TableStore {
  constructor(private readonly client: KeyValueClient) {}

  async readTable(name: string): Promise<Table> {
    let raw: string | null;
    try {
      raw = await this.client.get(tableKey(name));
    } catch (err) {
      throw new LedgerUnavailableError(name, { cause: err });
    }

    if (raw === null) return [];

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn({ err, table: name }, "Stored table is not valid JSON, treating as empty");
      return [];
    }

    const parsed = TableSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn(
        { table: name, issues: parsed.error.issues },
        "Stored table has an unexpected shape, treating as empty"
      );
      return [];
    }
    return parsed.data;
  }

  async writeTable(name: string, table: Table): Promise<void> {
    try {
      await this.client.set(tableKey(name), JSON.stringify(table));
    } catch (err) {
      throw new LedgerUnavailableError(name, { cause: err });
    }
  }
}

// -------------------------
// Connection
// -------------------------
export function createValkeyClient({
  host,
  port,
  password,
}: {
  host: string;
  port: number;
  password?: string;
}): IORedis {
  let isAvailable = false;

  const redisOpts: RedisOptions = {
    host,
    port,
    password,
    retryStrategy: () => 5000,
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: false,
  };

  const redis = new IORedis(redisOpts);

  redis.on("connect", () => {
    if (!isAvailable) {
      isAvailable = true;
      logger.info("Valkey connected");
    }
  });

  redis.on("error", (err: Error) => {
    if (isAvailable) {
      isAvailable = false;
      logger.warn({ err: err.message }, "Valkey unavailable");
    }
  });

  redis.on("close", () => {
    if (isAvailable) {
      isAvailable = false;
      logger.warn("Valkey connection closed");
    }
  });

  return redis;
}
