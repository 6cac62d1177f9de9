import fsp from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import {
  AppError,
  DEFAULT_RETRY_POLICY,
  errorMessage,
  isAppError,
  withRetry,
  type Logger,
  type RetryPolicy,
  type Sleep,
} from "@trackprint/shared";

import { timeoutSignal } from "../../lib/abort";
import type { EmbeddingModel, HiddenStates } from "../../types/processing";
import { TARGET_SAMPLE_RATE } from "../convert/convert.module";

export const MODEL_TIMEOUT_MS = 120_000;

const EmbedResponse = z.object({
  hidden_states: z.array(z.array(z.array(z.number()))),
});

const InfoResponse = z.object({
  sample_rate: z.number().int().positive(),
});

export type HttpEmbeddingModelOptions = {
  url: string;
  sampleRate?: number;
  timeoutMs?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
  fetchFn?: typeof fetch;
  log?: Logger;
};

function unavailable(message: string, cause?: unknown, details?: Record<string, unknown>) {
  return new AppError({ code: "EMBEDDING_MODEL_UNAVAILABLE", message, retryable: true, details, cause });
}

function modelError(message: string, details?: Record<string, unknown>) {
  return new AppError({ code: "EMBEDDING_MODEL_ERROR", message, retryable: false, details });
}

/**
 * Client of the inference service: `POST {url}/embed` with the clip as multipart
 * field `audio`, answered by `{"hidden_states": number[][][]}`.
 */
export class HttpEmbeddingModel implements EmbeddingModel {
  readonly sampleRate: number;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: HttpEmbeddingModelOptions) {
    this.baseUrl = opts.url.replace(/\/+$/, "");
    this.sampleRate = opts.sampleRate ?? TARGET_SAMPLE_RATE;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  /** asks the service for its sample rate and refuses one the normalizer does not produce */
  static async connect(opts: HttpEmbeddingModelOptions): Promise<HttpEmbeddingModel> {
    const probe = new HttpEmbeddingModel(opts);
    const body = await probe.request("/info", { method: "GET" });
    const info = InfoResponse.safeParse(body);
    if (!info.success) throw modelError("Embedding model /info response has the wrong shape");

    const expected = opts.sampleRate ?? TARGET_SAMPLE_RATE;
    if (info.data.sample_rate !== expected) {
      throw modelError(`Embedding model expects ${info.data.sample_rate} Hz audio, clips are ${expected} Hz`, {
        sampleRate: info.data.sample_rate,
      });
    }
    opts.log?.info({ url: probe.baseUrl, sampleRate: expected }, "embedding model ready");
    return probe;
  }

  async hiddenStates(wavPath: string, signal?: AbortSignal): Promise<HiddenStates> {
    const audio = await fsp.readFile(wavPath);

    try {
      return await withRetry(
        async () => {
          const form = new FormData();
          form.append("audio", new Blob([audio], { type: "audio/wav" }), path.basename(wavPath));
          const body = await this.request("/embed", { method: "POST", body: form }, signal);

          const parsed = EmbedResponse.safeParse(body);
          if (!parsed.success) {
            throw modelError(`Embedding model response has the wrong shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
          }
          return parsed.data.hidden_states;
        },
        this.opts.retry ?? DEFAULT_RETRY_POLICY,
        {
          operation: "embedding request",
          isRetryable: (err) => isAppError(err) && err.retryable && !signal?.aborted,
          sleep: this.opts.sleep,
          log: this.opts.log,
        }
      );
    } catch (err) {
      if (isAppError(err) && err.code === "RETRY_EXHAUSTED") {
        throw unavailable(err.message, err, { wavPath });
      }
      throw err;
    }
  }

  private async request(route: string, init: RequestInit, parent?: AbortSignal): Promise<unknown> {
    const { signal, dispose } = timeoutSignal(this.opts.timeoutMs ?? MODEL_TIMEOUT_MS, parent);
    try {
      let resp: Response;
      try {
        resp = await this.fetchFn(`${this.baseUrl}${route}`, { ...init, signal });
      } catch (err) {
        if (parent?.aborted) throw err;
        throw unavailable(`Embedding model unreachable: ${errorMessage(err)}`, err);
      }

      if (resp.status === 429 || resp.status >= 500) {
        throw unavailable(`Embedding model returned HTTP ${resp.status}`, undefined, { status: resp.status });
      }
      if (!resp.ok) {
        const text = await resp.text().catch(() => "");
        throw modelError(`Embedding model rejected the request: HTTP ${resp.status} ${text.slice(0, 200)}`.trim(), {
          status: resp.status,
        });
      }

      try {
        return await resp.json();
      } catch (err) {
        throw modelError(`Embedding model returned invalid JSON: ${errorMessage(err)}`);
      }
    } finally {
      dispose();
    }
  }
}

/**
 * Process-wide handle: the underlying model is created on first use and then
 * shared by every job. A failed load is forgotten so the next job tries again.
 */
export class SharedEmbeddingModel implements EmbeddingModel {
  private loading: Promise<EmbeddingModel> | null = null;

  constructor(
    private readonly load: () => Promise<EmbeddingModel>,
    readonly sampleRate: number = TARGET_SAMPLE_RATE
  ) {}

  get loaded() {
    return this.loading !== null;
  }

  private handle(): Promise<EmbeddingModel> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  async hiddenStates(wavPath: string, signal?: AbortSignal): Promise<HiddenStates> {
    const model = await this.handle();
    return model.hiddenStates(wavPath, signal);
  }
}
