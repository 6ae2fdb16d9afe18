/**
 * Error hierarchy for the session pipeline. Soft outcomes (discarded
 * records, dropped charges) are values and log events, never errors.
 */
export class SessionsError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }
}

/** A required element or attribute is missing or malformed. */
export class MarkupStructureError extends SessionsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "MARKUP_STRUCTURE", context);
  }
}

/** The reconciler met a charge group it cannot interpret. */
export class ChargeContractError extends SessionsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CHARGE_CONTRACT", context);
  }
}

/**
 * A trial record failed structurally. Fatal to the file that contains it.
 */
export class TrialParseError extends SessionsError {
  public readonly filePath: string;
  public readonly trialId?: string;

  constructor(filePath: string, trialId: string | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const where = trialId ? `trial ${trialId} of ${filePath}` : filePath;
    super(`Parse error in ${where}: ${detail}`, "TRIAL_PARSE", { filePath, trialId }, { cause });
    this.filePath = filePath;
    this.trialId = trialId;
  }
}

export class OccupationTableError extends SessionsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "OCCUPATION_TABLE", context);
  }
}

export class DataPathError extends SessionsError {
  constructor(dataDir: string) {
    super(`Data path ${dataDir} is not a directory`, "DATA_PATH", { dataDir });
  }
}
