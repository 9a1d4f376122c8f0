import type { UseCaseLogger } from "../ports/Logger";

export interface UseCaseDeps {
  clock: () => Date;
  logger: UseCaseLogger;
}

/** Trims; blank or missing becomes null. */
export function normalizeOptionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
