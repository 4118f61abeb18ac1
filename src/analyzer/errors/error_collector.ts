/**
 * Error collector for the program loader
 */

import {
  AggregateProgramLoadError,
  type ProgramLoadError,
} from "./alias_errors.js";

export class ErrorCollector {
  private errors: ProgramLoadError[] = [];

  constructor(private readonly source: string) {}

  add(error: ProgramLoadError): void {
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): ProgramLoadError[] {
    return [...this.errors];
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateProgramLoadError(this.source, this.errors);
    }
  }
}
