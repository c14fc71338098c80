import type { HttpClient } from "../httpClient";
import type { LocationConfig, PageStrategy } from "../types";
import { AddressLookupAdapter } from "./addressLookupAdapter";
import { ImageReferenceAdapter } from "./imageReferenceAdapter";
import { ScriptPayloadAdapter } from "./scriptPayloadAdapter";
import { FallbackSourceAdapter, type PageSourceAdapter, type SourceAdapter } from "./sourceAdapter";
import { TableAdapter } from "./tableAdapter";

const pageAdapters: Record<PageStrategy, (http: HttpClient) => PageSourceAdapter> = {
  table: (http) => new TableAdapter(http),
  script: (http) => new ScriptPayloadAdapter(http),
  image: (http) => new ImageReferenceAdapter(http),
};

/** Builds the adapter a location's configuration asks for, wrapping fallbacks when configured. */
export function createSourceAdapter(location: LocationConfig, http: HttpClient): SourceAdapter {
  if (location.strategy === "address") {
    return new AddressLookupAdapter(http);
  }

  const primary = pageAdapters[location.strategy](http);
  const fallbacks = (location.fallbackStrategies ?? [])
    .filter((strategy) => strategy !== location.strategy)
    .map((strategy) => pageAdapters[strategy](http));

  return fallbacks.length > 0
    ? new FallbackSourceAdapter(http, [primary, ...fallbacks])
    : primary;
}

export { AddressLookupAdapter } from "./addressLookupAdapter";
export type { FetchContext, SourceAdapter } from "./sourceAdapter";
