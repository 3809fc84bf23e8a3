export type CliFailureEvent = "extract.failed" | "check_connection.failed";

type FailureContext = Partial<Record<(typeof contextKeys)[number], number>>;

export type CliFailureEnvelope = {
  event: CliFailureEvent;
  name: string;
  message: string;
  code?: string;
  kind?: string;
  context?: FailureContext;
  status?: number;
  stack?: string;
};

// Cursors, URLs and causes stay out of the envelope; only counters are printed.
const contextKeys = ["pageNumber", "recordsProcessed", "batchSize"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const pickString = (source: Record<string, unknown>, key: string): string | undefined => {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
};

const pickCounters = (value: unknown): FailureContext | undefined => {
  if (!isRecord(value)) return undefined;

  const picked: FailureContext = {};
  for (const key of contextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) picked[key] = raw;
  }
  return Object.keys(picked).length > 0 ? picked : undefined;
};

/**
 * Transport errors carry their own `kind`; a fatal extraction error carries
 * it on its cause.
 */
const pickKind = (err: Record<string, unknown>): string | undefined =>
  pickString(err, "kind") ?? (isRecord(err.cause) ? pickString(err.cause, "kind") : undefined);

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (
  err: unknown,
  includeStack: boolean,
  event: CliFailureEvent = "extract.failed"
): CliFailureEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields = isRecord(err) ? err : {};

  const envelope: CliFailureEnvelope = { event, name: error.name || "Error", message: error.message };

  const code = pickString(fields, "code");
  if (code !== undefined) envelope.code = code;

  const kind = pickKind(fields);
  if (kind !== undefined) envelope.kind = kind;

  const context = pickCounters(fields.context);
  if (context) envelope.context = context;

  if (typeof fields.status === "number" && Number.isFinite(fields.status)) envelope.status = fields.status;

  if (includeStack && typeof error.stack === "string") envelope.stack = error.stack;

  return envelope;
};

/** Prints one envelope on stderr. */
export const reportCliFailure = (err: unknown, event: CliFailureEvent): void => {
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode(), event)));
};
