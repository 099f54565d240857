import axios from "axios";
import https from "https";
import OpenAI from "openai";
import { logger } from "./logger";
import { loadEnv, resolveSecret, resolveValkeyPassword } from "./config";
import { createValkeyClient, ValkeyTableStore } from "./store";
import { FileKeywordSource } from "./modules/keywordSource";
import { KeywordCache } from "./modules/keywordCache";
import { OpenAIRelevanceClassifier } from "./modules/relevanceClassifier";
import { runHarvest } from "./modules/harvest";
import { synthesizeDigests } from "./modules/digestSynthesizer";
import { dailyLedgerName } from "./constants/ledger";

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
const env = loadEnv();

const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
});
const axiosClient = axios.create({
    timeout: 10_000,
    httpsAgent,
});

const redis = createValkeyClient({
    host: env.VALKEY_HOST,
    port: env.VALKEY_PORT,
    password: resolveValkeyPassword(env),
});
const store = new ValkeyTableStore(redis);

const openaiKey = resolveSecret(env.OPENAI_API_KEY);
const openai = openaiKey ? new OpenAI({ apiKey: openaiKey }) : undefined;
if (!openai) {
    logger.warn("OPENAI_API_KEY not set - relevance filtering and digests disabled");
}

const classifier = openai && env.RELEVANCE_FILTER_ENABLED
    ? new OpenAIRelevanceClassifier(openai, env.OPENAI_MODEL)
    : undefined;

const keywords = new KeywordCache(
    new FileKeywordSource(env.KEYWORDS_FILE),
    env.KEYWORD_CACHE_TTL_MS
);

// -------------------------------------------------
// Harvest run
// -------------------------------------------------
let runInProgress = false;

async function harvestAndDigest(trigger: string): Promise<void> {
    if (runInProgress) {
        logger.info({ trigger }, "Harvest already in progress, skipping");
        return;
    }
    runInProgress = true;

    try {
        logger.info(`Harvest triggered by: ${trigger}`);

        const summary = await runHarvest({
            axiosClient,
            store,
            keywords,
            classifier,
            windowDays: env.RECENCY_WINDOW_DAYS,
            keywordDelayMs: env.KEYWORD_DELAY_MS,
            writeDelayMs: env.WRITE_DELAY_MS,
        });

        if (summary.inserted + summary.updated === 0) {
            logger.info("No articles accepted, skipping digest generation");
            return;
        }

        const ledger = await store.readTable(dailyLedgerName(summary.date));
        await synthesizeDigests({
            ledger,
            date: summary.date,
            store,
            openai,
            model: env.OPENAI_MODEL,
        });
    } finally {
        runInProgress = false;
    }
}

// -------------------------------------------------
// Scheduler
// -------------------------------------------------
let scheduler: NodeJS.Timeout | undefined;

function startHarvestScheduler(intervalMinutes: number) {
    const intervalMs = intervalMinutes * 60_000;

    scheduler = setInterval(() => {
        harvestAndDigest("interval").catch((err) => {
            logger.error({ err }, "Scheduled harvest failed");
        });
    }, intervalMs);

    logger.info(
        `Harvest scheduler started (every ${intervalMs / 1000}s). Next run at ${new Date(
            Date.now() + intervalMs
        ).toLocaleString()}`
    );
}

async function shutdown(signal: string, exitCode = 0) {
    logger.info(`Received ${signal}. Shutting down...`);
    if (scheduler) clearInterval(scheduler);
    httpsAgent.destroy();

    try {
        await redis.quit();
    } catch (err) {
        logger.warn({ err }, "Error disconnecting Valkey");
    }
    process.exit(exitCode);
}

async function main() {
    try {
        await harvestAndDigest("initial");
    } catch (err) {
        logger.error({ err }, "Harvest failed");
        await shutdown("fatal error", 1);
        return;
    }

    if (env.HARVEST_INTERVAL_MINUTES) {
        startHarvestScheduler(env.HARVEST_INTERVAL_MINUTES);
    } else {
        await shutdown("run complete");
    }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

void main();
