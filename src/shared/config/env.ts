export type Env = {
  MONGO_URI: string;
  CRM_ACCESS_TOKEN: string;
  CRM_BASE_URL: string;
};

const envDefaults = {
  MONGO_URI: "mongodb://localhost:27017/crm_extract",
  CRM_BASE_URL: "https://api.hubapi.com"
} as const;

const mongoSchemes = ["mongodb://", "mongodb+srv://"];

/** Trimmed value, or undefined when unset or blank. */
const readTrimmed = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

const readHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  // Clients append their own paths.
  return value.replace(/\/+$/, "");
};

// The URI may carry credentials, so it is never echoed back.
const readMongoUri = (value: string): string => {
  if (!mongoSchemes.some((scheme) => value.startsWith(scheme))) {
    throw new Error("MONGO_URI must start with mongodb:// or mongodb+srv://");
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => ({
  MONGO_URI: readMongoUri(readTrimmed(env, "MONGO_URI") ?? envDefaults.MONGO_URI),
  CRM_ACCESS_TOKEN: readTrimmed(env, "CRM_ACCESS_TOKEN") ?? "",
  CRM_BASE_URL: readHttpUrl("CRM_BASE_URL", readTrimmed(env, "CRM_BASE_URL") ?? envDefaults.CRM_BASE_URL)
});
