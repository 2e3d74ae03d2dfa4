export type ProviderEnvironment = "prod" | "uat";

const BASE_URLS: Record<ProviderEnvironment, string> = {
  prod: "https://api.acumidata.com",
  uat: "https://uat.api.acumidata.com",
};

function parseEnvironment(raw: string | undefined): ProviderEnvironment {
  return raw?.trim().toLowerCase() === "prod" ? "prod" : "uat";
}

/** Integer env value, or the fallback when unset or not a number */
export function readIntEnv(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  providerEnv: parseEnvironment(process.env.ACUMIDATA_ENV),
  prodApiKey: process.env.ACUMIDATA_PROD_KEY || "",
  uatApiKey: process.env.ACUMIDATA_UAT_KEY || "",
  requestTimeoutMs: readIntEnv(process.env.ACUMIDATA_TIMEOUT_MS, 30000),
  defaultConcurrency: readIntEnv(process.env.BATCH_DEFAULT_CONCURRENCY, 5),
  minConcurrency: 1,
  maxConcurrency: 10,
  largeDatasetRows: readIntEnv(process.env.BATCH_LARGE_DATASET_ROWS, 1000),
  getBaseUrl(
    this: { providerEnv: ProviderEnvironment },
    env: ProviderEnvironment = this.providerEnv,
  ): string {
    return BASE_URLS[env];
  },
  getApiKey(
    this: { providerEnv: ProviderEnvironment; prodApiKey: string; uatApiKey: string },
    env: ProviderEnvironment = this.providerEnv,
  ): string {
    return env === "prod" ? this.prodApiKey : this.uatApiKey;
  },
};
