/**
 * Raised inside the processing lane when the external pipeline fails or
 * its output cannot be used. Never reaches an HTTP caller: the processor
 * records `message` on the job and moves it to FAILED.
 */
export class ProcessingFault extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'ProcessingFault';
    this.exitCode = exitCode;
  }
}
