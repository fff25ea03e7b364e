import type { NotebookTestOutcome } from "./runner.js";

export type FailedOutcome = Extract<NotebookTestOutcome, { status: "failed" }>;

/** Thrown from a registered runner test when its notebook test case fails; the message is the report. */
export class NotebookTestFailure extends Error {
  readonly notebookPath: string;
  readonly testName: string;
  readonly outcome: FailedOutcome;

  constructor(notebookPath: string, testName: string, outcome: FailedOutcome) {
    super(outcome.report, { cause: outcome.error });
    this.name = "NotebookTestFailure";
    this.notebookPath = notebookPath;
    this.testName = testName;
    this.outcome = outcome;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
