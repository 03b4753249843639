import type { SearchRequest } from './search-request.types.js';

/** Already finished when created; used where no network round-trip is needed. */
export class InstantSearchRequest implements SearchRequest {
  private readonly found: readonly string[];

  constructor(
    readonly word: string,
    matches: readonly string[] = [],
    private readonly error = ''
  ) {
    this.found = [...matches];
  }

  matches(): string[] {
    return [...this.found];
  }

  isFinished(): boolean {
    return true;
  }

  errorMessage(): string {
    return this.error;
  }

  cancel(): void {}

  whenFinished(): Promise<void> {
    return Promise.resolve();
  }
}
