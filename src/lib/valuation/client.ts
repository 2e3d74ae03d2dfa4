import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config, type ProviderEnvironment } from "../config";
import type { FetchResult, InputRecord, ReportKind } from "../types";
import { isRecord } from "./normalize";
import { getReportEndpoint } from "./reports";

/** The one seam between the batch pipeline and the Provider */
export interface ValuationClient {
  fetchReport(record: InputRecord, kind: ReportKind): Promise<FetchResult>;
}

export interface ValuationClientOptions {
  env?: ProviderEnvironment;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export function buildReportUrl(baseUrl: string, kind: ReportKind, record: InputRecord): string {
  const params = new URLSearchParams({
    streetAddress: record.address,
    city: record.city,
    state: record.state,
    zip: record.zip,
  });
  return `${baseUrl.replace(/\/+$/, "")}/${getReportEndpoint(kind)}?${params.toString()}`;
}

export function createValuationClient(options: ValuationClientOptions = {}): ValuationClient {
  const env = options.env ?? config.providerEnv;
  const baseUrl = options.baseUrl ?? config.getBaseUrl(env);
  const apiKey = options.apiKey ?? config.getApiKey(env);
  const timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
  const dispatcher = getProxyDispatcher();

  if (!apiKey) {
    console.warn(`[valuation] No API key configured for the ${env} environment`);
  }

  return {
    async fetchReport(record: InputRecord, kind: ReportKind): Promise<FetchResult> {
      const url = buildReportUrl(baseUrl, kind, record);
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const response = await undiciFetch(url, {
          headers: {
            Accept: "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          signal: controller.signal,
          dispatcher,
        });

        if (!response.ok) {
          const body = await response.text().catch(() => "");
          console.warn(
            `[valuation] ${kind} row ${record.index}: HTTP ${response.status} ${body.slice(0, 200)}`
          );
          return { ok: false, error: `API returned status ${response.status}` };
        }

        const text = await response.text();
        let payload: unknown;
        try {
          payload = JSON.parse(text);
        } catch {
          return { ok: false, error: "Malformed response: body is not valid JSON" };
        }

        if (!isRecord(payload)) {
          return { ok: false, error: "Malformed response: expected a JSON object" };
        }
        return { ok: true, data: payload };
      } catch (error: unknown) {
        if (error instanceof Error && error.name === "AbortError") {
          return { ok: false, error: `Request timed out after ${timeoutMs}ms` };
        }
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
      } finally {
        clearTimeout(timeout);
      }
    },
  };
}
