import { FetchError, ParseError, errorMessage } from "./errors";
import { logger } from "./logger";

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchImpl;
}

const log = logger.child("http");

/**
 * Thin wrapper over fetch with a per-call timeout. Every failure leaves as a
 * FetchError so adapters can turn it into a failed outcome.
 */
export class HttpClient {
  private readonly fetchImpl: FetchImpl;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async getText(url: string): Promise<string> {
    const body = await this.request(url, "text/html,application/xhtml+xml,*/*");
    log.debug(`Fetched ${url} (${body.length} chars)`);
    return body;
  }

  async getJson(url: string): Promise<unknown> {
    const body = await this.request(url, "application/json");
    try {
      return JSON.parse(body);
    } catch {
      throw new ParseError("MalformedStructure", `Response from ${url} is not valid JSON`, {
        url,
      });
    }
  }

  private async request(url: string, accept: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: accept,
        },
        redirect: "follow",
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(
          "HttpStatus",
          `Request to ${url} failed with status ${response.status}`,
          { url, status: response.status }
        );
      }
      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new FetchError(
          "Timeout",
          `Request to ${url} timed out after ${this.options.timeoutMs}ms`,
          { url }
        );
      }
      throw new FetchError(
        "NetworkError",
        `Request to ${url} failed: ${errorMessage(error)}`,
        { url }
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
