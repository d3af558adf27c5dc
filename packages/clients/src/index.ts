import fetch from 'node-fetch';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type ExtractDocumentBody = {
  path: string;
  force_ocr?: boolean;
  vendor_code?: string;
};

export type JobStatus = 'queued' | 'processing' | 'done' | 'failed';

// `result` is the serialized extraction/parse/record bundle; callers decode it with the core serializers.
export type JobResponse = {
  id: string;
  status: JobStatus;
  result?: Record<string, unknown>;
  error?: string;
};

export type WaitOptions = { intervalMs?: number; timeoutMs?: number };

export class ApiError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message);
    this.name = 'ApiError';
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const JOB_STATUSES: readonly JobStatus[] = ['queued', 'processing', 'done', 'failed'];

function toJob(data: unknown): JobResponse {
  if (!isRecord(data) || typeof data.id !== 'string') throw new ApiError(0, 'bad_response', 'Malformed job response');
  const status = JOB_STATUSES.find((s) => s === data.status);
  if (!status) throw new ApiError(0, 'bad_response', `Unknown job status: ${String(data.status)}`);
  const job: JobResponse = { id: data.id, status };
  if (isRecord(data.result)) job.result = data.result;
  if (typeof data.error === 'string') job.error = data.error;
  return job;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class InvoiceApiClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private async request(path: string, init: { method?: string; body?: string } = {}): Promise<unknown> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, { ...init, headers: this.headers() });
    const data: unknown = await r.json();
    if (!r.ok) {
      const code = isRecord(data) && typeof data.error === 'string' ? data.error : 'http_error';
      const message = isRecord(data) && typeof data.message === 'string' ? data.message : `HTTP ${r.status}`;
      throw new ApiError(r.status, code, message);
    }
    return data;
  }

  async health(): Promise<{ ok: boolean }> {
    const data = await this.request('/health');
    return { ok: isRecord(data) && data.ok === true };
  }

  async extractDocument(body: ExtractDocumentBody): Promise<{ job_id: string }> {
    const data = await this.request('/documents/extract', { method: 'POST', body: JSON.stringify(body) });
    if (!isRecord(data) || typeof data.job_id !== 'string') throw new ApiError(0, 'bad_response', 'Missing job_id');
    return { job_id: data.job_id };
  }

  async job(id: string): Promise<JobResponse> {
    return toJob(await this.request(`/jobs/${encodeURIComponent(id)}`));
  }

  // Polls until the job leaves the queued/processing states.
  async waitForJob(id: string, opts: WaitOptions = {}): Promise<JobResponse> {
    const interval = opts.intervalMs ?? 500;
    const deadline = Date.now() + (opts.timeoutMs ?? 60_000);
    for (;;) {
      const job = await this.job(id);
      if (job.status === 'done' || job.status === 'failed') return job;
      if (Date.now() >= deadline) throw new ApiError(0, 'timeout', `Job ${id} did not finish in time`);
      await sleep(interval);
    }
  }
}
