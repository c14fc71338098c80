import * as cheerio from "cheerio";
import type { HttpClient } from "../httpClient";
import type { Extraction, FetchOutcome, LocationConfig } from "../types";
import { PageSourceAdapter, failure } from "./sourceAdapter";

const SCHEDULE_HINT = /(grafik|графік|grafiky|schedule|gpv|vidkl|shutdown|outage)/i;
const IMAGE_EXTENSION = /\.(png|jpe?g|webp|gif)(\?.*)?$/i;

/** Finds the schedule image on a page and returns its absolute URL, or null. */
export function findScheduleImage(html: string, pageUrl: string, selector?: string): string | null {
  const $ = cheerio.load(html);
  let reference: string | undefined;

  if (selector) {
    const target = $(selector).first();
    const image = target.is("img") ? target : target.find("img").first();
    reference = image.attr("data-src") ?? image.attr("src") ?? target.attr("href");
  }

  if (!reference) {
    $("img").each((_, el) => {
      const $img = $(el);
      const src = $img.attr("data-src") ?? $img.attr("src");
      const hints = [src, $img.attr("alt"), $img.attr("class"), $img.attr("title")].join(" ");
      if (src && SCHEDULE_HINT.test(hints)) {
        reference = src;
        return false;
      }
      return undefined;
    });
  }

  if (!reference) {
    $("a[href]").each((_, el) => {
      const href = $(el).attr("href");
      if (href && IMAGE_EXTENSION.test(href) && SCHEDULE_HINT.test(`${href} ${$(el).text()}`)) {
        reference = href;
        return false;
      }
      return undefined;
    });
  }

  if (!reference) {
    return null;
  }

  try {
    return new URL(reference.trim(), pageUrl).toString();
  } catch {
    return null;
  }
}

export class ImageReferenceAdapter extends PageSourceAdapter {
  readonly strategy = "image" as const;

  constructor(http: HttpClient) {
    super(http, "image");
  }

  protected extract(html: string, location: LocationConfig): FetchOutcome<Extraction> {
    const url = findScheduleImage(html, location.url, location.imageSelector);
    if (!url) {
      return failure("NoRecognizedFormat", `No schedule image found on ${location.url}`);
    }
    this.log.debug(`${location.id}: schedule image ${url}`);
    return { kind: "data", value: { kind: "image", url } };
  }
}
