// apps/scorer/src/errors.ts

export type ScoringInputErrorV1 = {
  code: "INVALID_BODY" | "FILE_REQUIRED" | "CSV_PARSE_FAILED";
  path: string;
  message: string;
};

/** Request input the scorer refuses to run on. Routes render it as `{ ok: false, errors }`. */
export class ScoringInputRejected extends Error {
  public readonly status: number;
  public readonly errors: ScoringInputErrorV1[];

  constructor(status: number, errors: ScoringInputErrorV1[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "ScoringInputRejected";
    this.status = status;
    this.errors = errors;
  }
}
