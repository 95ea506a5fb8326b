/**
 * Result of moving one document into the asset store
 */
export type ProcessingOutcome =
  | {
      readonly succeeded: true;
      readonly statusCode: string;
      readonly documentId: string;
      readonly url: string;
    }
  | {
      readonly succeeded: false;
      readonly statusCode: string;
      readonly documentId: string;
      readonly errorMessage: string;
    };
