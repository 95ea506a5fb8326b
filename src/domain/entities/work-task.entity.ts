/**
 * Document attached to a work-management task.
 * The id doubles as the object key in the asset store.
 */
export interface TaskDocument {
  readonly id: string;
  readonly name?: string;
  readonly description?: string;
}

/**
 * Task as read from the work-management API. Only the fields this job reads
 * or writes are carried.
 */
export interface WorkTask {
  readonly id: string;
  readonly name?: string;
  readonly status: string;
  readonly hasDocuments: boolean;
  readonly documents: readonly TaskDocument[];
}

/**
 * Human-readable label for a document, falling back to its id.
 */
export function documentLabel(document: TaskDocument): string {
  return document.name && document.name.trim() !== '' ? document.name : document.id;
}
