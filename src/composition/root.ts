import { extractRecords } from "../application/extract-records/extractRecords.usecase";
import type { ExtractionRunSummary } from "../application/extract-records/extract.error-handler";
import { CrmAccountHttpClient, type ConnectionReport } from "../infrastructure/crm/CrmAccountHttpClient";
import { buildRecordUrlBase, CrmRecordsHttpClient } from "../infrastructure/crm/CrmRecordsHttpClient";
import { RetryingRequestExecutor } from "../infrastructure/crm/RetryingRequestExecutor";
import { MongoCheckpointStore } from "../infrastructure/mongo/MongoCheckpointStore";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoRecordRepository } from "../infrastructure/mongo/MongoRecordRepository";
import { loadEnv, type Env } from "../shared/config/env";
import { loadExtractionJobFromEnv, loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { createSlidingWindowRateLimiter } from "../shared/ratelimit/slidingWindowRateLimiter";

const buildCrmClients = (env: Env, config: RuntimeConfig) => {
  if (env.CRM_ACCESS_TOKEN === "") {
    throw new Error("CRM_ACCESS_TOKEN is required");
  }

  // One limiter per process: every request of this account shares the budget.
  const rateLimiter = createSlidingWindowRateLimiter(config.rateLimit);
  const executor = new RetryingRequestExecutor({
    rateLimiter,
    policy: config.retryPolicy,
    defaultHeaders: {
      authorization: `Bearer ${env.CRM_ACCESS_TOKEN}`,
      accept: "application/json"
    }
  });
  const records = new CrmRecordsHttpClient(executor, env.CRM_BASE_URL, config.objectType);

  return { executor, records };
};

export const runExtraction = async (processEnv: NodeJS.ProcessEnv = process.env): Promise<ExtractionRunSummary> => {
  const env = loadEnv(processEnv);
  const config = loadRuntimeConfigFromEnv(processEnv);
  const job = loadExtractionJobFromEnv(processEnv);
  const { records } = buildCrmClients(env, config);

  const control = { pause: false, cancel: false };
  const onPause = () => {
    control.pause = true;
  };
  const onCancel = () => {
    control.cancel = true;
  };

  const mongo = await createMongoClient(env.MONGO_URI);
  process.on("SIGINT", onPause);
  process.on("SIGTERM", onCancel);

  try {
    return await extractRecords(
      {
        client: records,
        repo: new MongoRecordRepository(mongo),
        checkpoints: new MongoCheckpointStore(mongo)
      },
      {
        runId: job.scanId,
        organizationId: job.organizationId,
        filters: config.filters,
        resume: job.resume,
        shouldCancel: () => control.cancel,
        shouldPause: () => control.pause,
        recordUrlBase: job.portalId ? buildRecordUrlBase(job.portalId, config.objectType) : undefined
      }
    );
  } finally {
    process.off("SIGINT", onPause);
    process.off("SIGTERM", onCancel);
    await mongo.close();
  }
};

export const runConnectionCheck = async (processEnv: NodeJS.ProcessEnv = process.env): Promise<ConnectionReport> => {
  const env = loadEnv(processEnv);
  const config = loadRuntimeConfigFromEnv(processEnv);
  const { executor, records } = buildCrmClients(env, config);

  const account = new CrmAccountHttpClient(executor, env.CRM_BASE_URL, records, config.rateLimit);
  return account.testConnection();
};
