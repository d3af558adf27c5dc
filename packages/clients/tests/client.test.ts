import { beforeEach, describe, it, expect, vi } from "vitest";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

// Import after mocks
import fetch, { Response } from "node-fetch";
import { ApiError, InvoiceApiClient } from "../src/index";

const fetchMock = vi.mocked(fetch);

function reply(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("InvoiceApiClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("checks health", async () => {
    fetchMock.mockResolvedValueOnce(reply({ ok: true }));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test" });

    await expect(client.health()).resolves.toEqual({ ok: true });
    expect(fetchMock.mock.calls[0][0]).toBe("http://api.test/health");
  });

  it("posts an extraction request with the API key", async () => {
    fetchMock.mockResolvedValueOnce(reply({ job_id: "job-1" }));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test", apiKey: "test-key" });

    await expect(client.extractDocument({ path: "/data/acme.pdf", force_ocr: true })).resolves.toEqual({ job_id: "job-1" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://api.test/documents/extract");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({ path: "/data/acme.pdf", force_ocr: true });
  });

  it("raises the API error code", async () => {
    fetchMock.mockResolvedValueOnce(reply({ error: "document_not_found", path: "/nope.pdf" }, 404));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test" });

    const err = await client.extractDocument({ path: "/nope.pdf" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 404, code: "document_not_found", message: "HTTP 404" });
  });

  it("polls a job until it finishes", async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ id: "job-1", status: "processing" }))
      .mockResolvedValueOnce(reply({ id: "job-1", status: "done", result: { tsv: "a\tb" } }));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test" });

    const job = await client.waitForJob("job-1", { intervalMs: 0 });
    expect(job).toEqual({ id: "job-1", status: "done", result: { tsv: "a\tb" } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe("http://api.test/jobs/job-1");
  });

  it("gives up when the deadline passes", async () => {
    fetchMock.mockImplementation(async () => reply({ id: "job-1", status: "processing" }));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test" });

    await expect(client.waitForJob("job-1", { intervalMs: 0, timeoutMs: 0 })).rejects.toThrow("Job job-1 did not finish in time");
  });

  it("rejects a malformed job payload", async () => {
    fetchMock.mockResolvedValueOnce(reply({ id: "job-1", status: "paused" }));
    const client = new InvoiceApiClient({ baseUrl: "http://api.test" });
    await expect(client.job("job-1")).rejects.toThrow("Unknown job status: paused");
  });
});
