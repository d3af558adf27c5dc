import path from "path";
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import {
  DocumentNotFoundError,
  assertDocumentExists,
  extractionResultToJSON,
  getErrorMessage,
  getLogger,
  parseResultToJSON,
  toTsv,
  type ExtractionResultJSON,
  type InvoicePipeline,
  type InvoiceRecord,
  type ParseResultJSON,
} from "@invoice-pipeline/core";

export type JobResult = {
  extraction: ExtractionResultJSON;
  parse: ParseResultJSON;
  record: InvoiceRecord;
  tsv: string;
};

export type JobRecord = {
  id: string;
  status: "queued" | "processing" | "done" | "failed";
  result?: JobResult;
  error?: string;
};

export type ExtractRequest = {
  path: string;
  forceOcr: boolean;
  vendorCode?: string;
};

// Returns an error message, or the normalized request body.
function readExtractRequest(body: unknown): ExtractRequest | string {
  if (typeof body !== "object" || body === null) return "path required";
  const docPath = "path" in body ? body.path : undefined;
  if (typeof docPath !== "string" || !docPath.trim()) return "path required";
  const forceOcr = "force_ocr" in body ? body.force_ocr : undefined;
  if (forceOcr !== undefined && typeof forceOcr !== "boolean") return "force_ocr must be a boolean";
  const vendorCode = "vendor_code" in body ? body.vendor_code : undefined;
  if (vendorCode !== undefined && typeof vendorCode !== "string") return "vendor_code must be a string";
  return { path: docPath, forceOcr: forceOcr ?? false, vendorCode };
}

// Resolves a request path against the documents root; null when it escapes the root.
function resolveDocumentPath(root: string, requested: string): string | null {
  const resolved = path.resolve(root, requested);
  const rel = path.relative(root, resolved);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
  return resolved;
}

function requestId(req: Request): string {
  const header = req.headers["x-request-id"];
  const id = Array.isArray(header) ? header[0] : header;
  return id || uuidv4();
}

export type AppOptions = {
  /** Requests may only name documents under this directory. */
  documentsDir: string;
  /** How long a finished job stays readable. Defaults to 15 minutes. */
  jobTtlMs?: number;
};

const DEFAULT_JOB_TTL_MS = 15 * 60 * 1000;

export function createApp(pipeline: InvoicePipeline, opts: AppOptions) {
  const app = express();
  const logger = getLogger("api");
  const documentsDir = path.resolve(opts.documentsDir);
  const jobTtlMs = opts.jobTtlMs ?? DEFAULT_JOB_TTL_MS;
  // In-memory job store; finished jobs are dropped after the TTL.
  const jobs = new Map<string, JobRecord>();

  function expireLater(jobId: string) {
    setTimeout(() => jobs.delete(jobId), jobTtlMs).unref();
  }

  app.use(express.json({ limit: "1mb" }));
  app.use(cors());
  app.use(helmet());
  // Polling and successful responses are too noisy to log.
  app.use(morgan("dev", {
    skip: (req, res) => (req.url ?? "").startsWith("/jobs") || res.statusCode < 400,
  }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.locals.reqId = requestId(req);
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  // POST /documents/extract { path, force_ocr?, vendor_code? } -> { job_id }
  app.post("/documents/extract", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const parsed = readExtractRequest(body);
    if (typeof parsed === "string") {
      res.status(400).json({ error: "invalid_request", message: parsed });
      return;
    }
    const docPath = resolveDocumentPath(documentsDir, parsed.path);
    if (docPath === null) {
      res.status(400).json({ error: "invalid_request", message: "path must be inside the documents directory" });
      return;
    }
    try {
      assertDocumentExists(docPath);
    } catch (e) {
      if (e instanceof DocumentNotFoundError) {
        res.status(404).json({ error: e.code, path: e.path });
        return;
      }
      res.status(500).json({ error: "internal_error", message: getErrorMessage(e) });
      return;
    }

    const jobId = uuidv4();
    const job: JobRecord = { id: jobId, status: "processing" };
    jobs.set(jobId, job);
    const log = logger.child({ job_id: jobId, req_id: String(res.locals.reqId), document: docPath });
    log.info("extract.job.start", { force_ocr: parsed.forceOcr });
    res.json({ job_id: jobId });

    try {
      const { extraction, parse, record } = await pipeline.process(docPath, {
        forceOcr: parsed.forceOcr,
        vendorCode: parsed.vendorCode,
      });
      job.result = {
        extraction: extractionResultToJSON(extraction),
        parse: parseResultToJSON(parse),
        record,
        tsv: toTsv(record),
      };
      job.status = "done";
      log.info("extract.job.done", { pages: extraction.pages.length, ocr_used: extraction.ocrUsed });
    } catch (e) {
      job.status = "failed";
      job.error = getErrorMessage(e);
      log.error("extract.job.failed", { error: job.error });
    }
    expireLater(jobId);
  });

  app.get("/jobs/:id", (req: Request, res: Response) => {
    const job = jobs.get(req.params.id);
    if (!job) {
      res.status(404).json({ error: "not_found" });
      return;
    }
    res.json(job);
  });

  return app;
}
