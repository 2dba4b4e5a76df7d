import type { ProviderKind } from "./types.js";

export class ProviderRequestError extends Error {
  public readonly provider: ProviderKind;
  public readonly status: number | undefined;

  public constructor(provider: ProviderKind, message: string, status?: number) {
    super(status === undefined ? `${provider} request failed: ${message}` : `${provider} request failed with status ${status}: ${message}`);
    this.name = "ProviderRequestError";
    this.provider = provider;
    this.status = status;
  }
}

export class UnknownProviderError extends Error {
  public constructor(provider: string) {
    super(`Unknown provider: ${provider}`);
    this.name = "UnknownProviderError";
  }
}
