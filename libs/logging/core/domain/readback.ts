import { LogMessage } from './log-message';

export interface ReadbackMismatch {
  expected: readonly LogMessage[];
  observed: readonly LogMessage[];
  /** First position where the sequences differ. */
  index: number;
}

export class ReadbackVerifier {
  /**
   * Compare a sink's read-back against the messages written to it.
   * Returns undefined on an exact match.
   */
  static compare(
    expected: readonly LogMessage[],
    observed: readonly LogMessage[],
  ): ReadbackMismatch | undefined {
    const shared = Math.min(expected.length, observed.length);
    for (let index = 0; index < shared; index++) {
      if (expected[index] !== observed[index]) {
        return { expected, observed, index };
      }
    }
    if (expected.length !== observed.length) {
      return { expected, observed, index: shared };
    }
    return undefined;
  }

  static describe(mismatch: ReadbackMismatch): string {
    return `expected: ${JSON.stringify(mismatch.expected)}; but observed: ${JSON.stringify(mismatch.observed)}`;
  }
}
