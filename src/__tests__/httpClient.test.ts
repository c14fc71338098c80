import { describe, it, expect } from "vitest";
import { FetchError, ParseError } from "../errors";
import { HttpClient, type FetchImpl } from "../httpClient";
import { httpWith } from "./helpers";

const URL_OK = "https://power.example.test/ok";

describe("HttpClient", () => {
  it("returns the body and sends the configured user agent", async () => {
    let headers: RequestInit["headers"];
    const fetchImpl: FetchImpl = async (_input, init) => {
      headers = init?.headers;
      return new Response("<p>hello</p>");
    };
    const http = new HttpClient({ timeoutMs: 1000, userAgent: "test-agent", fetchImpl });

    await expect(http.getText(URL_OK)).resolves.toBe("<p>hello</p>");
    expect(headers).toMatchObject({ "User-Agent": "test-agent" });
  });

  it("raises HttpStatus for non-success responses", async () => {
    const http = httpWith({ [URL_OK]: { status: 404, body: "missing" } });

    const error = await http.getText(URL_OK).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: "HttpStatus", details: { status: 404 } });
  });

  it("raises NetworkError when the request cannot be made", async () => {
    await expect(httpWith({}).getText(URL_OK)).rejects.toMatchObject({ kind: "NetworkError" });
  });

  it("raises Timeout when the response does not arrive in time", async () => {
    const hanging: FetchImpl = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const http = new HttpClient({ timeoutMs: 20, userAgent: "test-agent", fetchImpl: hanging });

    await expect(http.getText(URL_OK)).rejects.toMatchObject({ kind: "Timeout" });
  });

  it("decodes JSON and reports malformed JSON as a parse error", async () => {
    const http = httpWith({
      "https://power.example.test/good.json": { body: '{"groups":[]}' },
      "https://power.example.test/bad.json": { body: "<html>" },
    });

    await expect(http.getJson("https://power.example.test/good.json")).resolves.toEqual({ groups: [] });
    const error = await http.getJson("https://power.example.test/bad.json").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ kind: "MalformedStructure" });
  });
});
