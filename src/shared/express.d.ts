/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * Adds requestStartTime to Express Request: requestTimer records when the
 * request entered the pipeline and controllers report totalTimeMs from it.
 * Files that touch the field reference this one directly, since ts-jest only
 * sees declarations reachable from the test's imports.
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer middleware; used to compute totalTimeMs in responses. */
      requestStartTime?: number;
    }
  }
}

export {};
