import type { HttpClient } from "../httpClient";
import { errorMessage, toFailureReason } from "../errors";
import { logger, type Logger } from "../logger";
import type {
  Extraction,
  FailureReason,
  FetchOutcome,
  LocationConfig,
  PageStrategy,
  ParserStrategy,
} from "../types";

export interface FetchContext {
  /** Address keys ("<streetId>:<houseId>") subscribers of the location are bound to. */
  addressKeys: string[];
}

export interface SourceAdapter {
  readonly strategy: ParserStrategy;
  fetch(location: LocationConfig, context: FetchContext): Promise<FetchOutcome<Extraction>>;
}

export function failure<T>(reason: FailureReason, message: string): FetchOutcome<T> {
  return { kind: "failure", reason, message };
}

export function failureFrom<T>(error: unknown): FetchOutcome<T> {
  return failure(toFailureReason(error), errorMessage(error));
}

/**
 * Base for strategies that read the location's own page. The page is
 * downloaded once and handed to `parse`; anything thrown while fetching or
 * extracting becomes a failed outcome.
 */
export abstract class PageSourceAdapter implements SourceAdapter {
  abstract readonly strategy: PageStrategy;
  protected readonly log: Logger;

  constructor(protected readonly http: HttpClient, scope: string) {
    this.log = logger.child(`source:${scope}`);
  }

  async fetch(location: LocationConfig): Promise<FetchOutcome<Extraction>> {
    let html: string;
    try {
      html = await this.http.getText(location.url);
    } catch (error) {
      this.log.warn(`Fetch failed for ${location.id}: ${errorMessage(error)}`);
      return failureFrom(error);
    }
    return this.parse(html, location);
  }

  parse(html: string, location: LocationConfig): FetchOutcome<Extraction> {
    try {
      return this.extract(html, location);
    } catch (error) {
      this.log.warn(`Parse failed for ${location.id}: ${errorMessage(error)}`);
      return failureFrom(error);
    }
  }

  protected abstract extract(html: string, location: LocationConfig): FetchOutcome<Extraction>;
}

/**
 * Runs the primary strategy and then each fallback over the same document,
 * stopping at the first outcome that is not "no recognized format".
 */
export class FallbackSourceAdapter extends PageSourceAdapter {
  readonly strategy: PageStrategy;

  constructor(
    http: HttpClient,
    private readonly chain: readonly [PageSourceAdapter, ...PageSourceAdapter[]]
  ) {
    super(http, "fallback");
    this.strategy = chain[0].strategy;
  }

  override parse(html: string, location: LocationConfig): FetchOutcome<Extraction> {
    let last: FetchOutcome<Extraction> = failure(
      "NoRecognizedFormat",
      `No strategy recognized the page of ${location.id}`
    );

    for (const adapter of this.chain) {
      const outcome = adapter.parse(html, location);
      if (outcome.kind !== "failure" || outcome.reason !== "NoRecognizedFormat") {
        if (adapter !== this.chain[0]) {
          this.log.info(`${location.id}: ${adapter.strategy} strategy used as fallback`);
        }
        return outcome;
      }
      last = outcome;
    }
    return last;
  }

  protected extract(): FetchOutcome<Extraction> {
    return failure("NoRecognizedFormat", "Fallback chain has no extractor of its own");
  }
}
