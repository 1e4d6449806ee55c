import type {
  BranchHomologation,
  BranchHomologationKey,
  BranchMetadata,
  ProductHomologation,
  ProductHomologationKey,
  RejectionAssignments,
  RejectionCriteria,
  RejectionRecord,
  SharedValueAssignments,
  SharedValueSource,
} from '../types/rejections.js';

/**
 * Operations the import workflow performs against the relational store.
 * Every call is awaited before the next one is issued; no transaction spans
 * several calls.
 */
export interface RejectionStore {
  rejectionTableExists(): Promise<boolean>;

  /** Resolves with the number of records the update matched. */
  updateRejection(rejectionId: number, assignments: RejectionAssignments): Promise<number>;

  findRejection(rejectionId: number): Promise<RejectionRecord | null>;

  /**
   * Copies the homologated value onto every other `PROPSTID` rejection with
   * the same country and barcode whose group shares product codes. Resolves
   * with the ids it updated.
   */
  propagateHomologatedValue(source: SharedValueSource, assignments: SharedValueAssignments): Promise<number[]>;

  findRejections(rejectionIds: number[], criteria: RejectionCriteria): Promise<RejectionRecord[]>;

  findProductDescriptions(productIds: string[]): Promise<Map<string, string>>;

  findWeekStart(year: number, week: number): Promise<Date | null>;

  productHomologationExists(key: ProductHomologationKey): Promise<boolean>;

  insertProductHomologation(row: ProductHomologation): Promise<void>;

  findBranchMetadata(branchId: string): Promise<BranchMetadata | null>;

  branchHomologationExists(key: BranchHomologationKey): Promise<boolean>;

  insertBranchHomologation(row: BranchHomologation): Promise<void>;
}
