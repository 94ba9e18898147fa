import { EmbeddingError } from "@storyvault/errors";
import { createSilentLogger, type Logger } from "@storyvault/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbedderOptions {
  /** Per-call timeout in milliseconds. 0 disables it. */
  timeoutMs: number;
  logger?: Logger;
}

function abortReasonMessage(signal: AbortSignal, timeoutMs: number): string {
  const reason: unknown = signal.reason;
  if (typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError") {
    return `Embedding request timed out after ${String(timeoutMs)}ms`;
  }
  return "Embedding request was aborted";
}

/**
 * Reject as soon as the signal fires, even if the provider ignores it.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Single `text -> vector` call over an embedding provider. Every failure,
 * including timeouts and malformed responses, surfaces as an EmbeddingError.
 */
export class Embedder {
  private readonly provider: IEmbeddingProvider;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(provider: IEmbeddingProvider, options: EmbedderOptions) {
    this.provider = provider;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createSilentLogger();
  }

  get providerName(): string {
    return this.provider.name;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const signals: AbortSignal[] = [];
    if (this.timeoutMs > 0) signals.push(AbortSignal.timeout(this.timeoutMs));
    if (signal) signals.push(signal);
    const combined = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    const start = Date.now();
    let vector: number[] | undefined;
    try {
      const result = await raceAbort(this.provider.embed(text, { signal: combined }), combined);
      vector = result.embeddings[0];
      this.logger.debug(
        { provider: this.provider.name, tokensUsed: result.tokensUsed, ms: Date.now() - start },
        "embedding received",
      );
    } catch (err) {
      if (combined?.aborted) {
        throw new EmbeddingError(abortReasonMessage(combined, this.timeoutMs), this.provider.name, {
          cause: err,
        });
      }
      throw new EmbeddingError("Embedding request failed", this.provider.name, { cause: err });
    }

    if (!vector || vector.length === 0) {
      throw new EmbeddingError("Embedding provider returned no vector", this.provider.name);
    }
    if (vector.length !== this.provider.dimensions) {
      throw new EmbeddingError(
        `Embedding has ${String(vector.length)} dimensions, expected ${String(this.provider.dimensions)}`,
        this.provider.name,
        { details: { received: vector.length, expected: this.provider.dimensions } },
      );
    }

    return vector;
  }
}
