import OpenAI from "openai";

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ModelNotFoundError extends ProviderError {}
export class BadRequestError extends ProviderError {}
export class ServerError extends ProviderError {}
export class RateLimitError extends ProviderError {}
export class NetworkError extends ProviderError {}

/** A session feature the driver does not implement (e.g. structured thinking). */
export class UnsupportedFeatureError extends Error {
  constructor(readonly feature: string) {
    super(`Unsupported feature: ${feature}`);
    this.name = "UnsupportedFeatureError";
  }
}

/** The agent asked for something its configuration cannot provide. */
export class MissingCapabilityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MissingCapabilityError";
  }
}

const NETWORK_MARKERS = ["econnreset", "etimedout", "econnrefused", "socket hang up", "fetch failed"];

/**
 * Maps SDK and transport failures onto the provider error hierarchy.
 * Anything unrecognised is returned unchanged.
 */
export function classifyProviderError(err: unknown): unknown {
  if (err instanceof ProviderError) return err;

  if (err instanceof OpenAI.APIConnectionError) {
    return new NetworkError(err.message, undefined, { cause: err });
  }

  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === 404) return new ModelNotFoundError(err.message, status, { cause: err });
    if (status === 400) return new BadRequestError(err.message, status, { cause: err });
    if (status === 429) return new RateLimitError(err.message, status, { cause: err });
    if (status !== undefined && status >= 500) return new ServerError(err.message, status, { cause: err });
    return err;
  }

  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (NETWORK_MARKERS.some((marker) => msg.includes(marker))) {
      return new NetworkError(err.message, undefined, { cause: err });
    }
  }

  return err;
}
