export type CellValue = string | number | boolean | Date | null;

/** Column name → cell values, one entry per data row, in file order. */
export type RawTable = Record<string, CellValue[]>;

export type RejectionRecord = {
  rejectionId: number;
  case: string | null;
  caseOwner: string | null;
  homologatedValue: string | null;
  rejectedField: string | null;
  rejectedValue: string | null;
  countryId: number | null;
  barcode: string | null;
  groupId: number | null;
  module: string | null;
  rejectionReason: string | null;
  weekCode: number | null;
  updatedAt: Date | null;
  resolvedAt: Date | null;
};

export type UpdateRow = {
  rejectionId: number;
  case: string | null;
  caseOwner: string | null;
  homologatedValue: string | null;
  updatedAt: Date;
  resolvedAt: Date;
};

export type RejectionAssignments = {
  updatedAt: Date;
  resolvedAt: Date;
  case?: string;
  caseOwner?: string;
  homologatedValue?: string;
};

export type SharedValueSource = {
  rejectionId: number;
  countryId: number | null;
  barcode: string | null;
};

export type SharedValueAssignments = {
  homologatedValue: string;
  updatedAt: Date;
  resolvedAt: Date;
};

/**
 * Equality filters applied on top of an id list. `homologatedValuePresent`
 * additionally excludes records without a homologated value.
 */
export type RejectionCriteria = {
  caseOwner: string;
  module: string;
  rejectedField: string;
  rejectionReason: string;
  case?: string;
  homologatedValuePresent?: boolean;
};

export type ProductHomologationKey = {
  countryId: number | null;
  productCode: string;
  groupId: number | null;
};

export type ProductHomologation = ProductHomologationKey & {
  description: string;
  productId: string;
  barcode: string | null;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
  validFrom: Date | null;
  validUntil: Date;
};

export type BranchHomologationKey = {
  countryId: number | null;
  branchNumber: string;
  groupId: number;
};

export type BranchHomologation = BranchHomologationKey & {
  chainId: number | null;
  description: string | null;
  address: string | null;
  branchId: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
  validFrom: Date | null;
  validUntil: Date;
};

export type BranchMetadata = {
  groupId: number;
  chainId: number | null;
  name: string | null;
  street: string | null;
};

export type ValidationResult = {
  valid: boolean;
  errors: string[];
};

export type UpdateSummary = {
  total: number;
  updated: number;
  failed: number;
  errors: string[];
  updatedIds: number[];
};

export type ProductHomologationDetail = {
  rejectionId: number;
  countryId: number | null;
  productCode: string;
  groupId: number | null;
  productId: string;
};

export type BranchHomologationDetail = {
  rejectionId: number;
  countryId: number | null;
  branchNumber: string;
  groupId: number;
  branchId: string;
};

export type DerivationSummary<TDetail> = {
  total: number;
  inserted: number;
  duplicated: number;
  failed: number;
  errors: string[];
  duplicates: TDetail[];
  insertedDetails: TDetail[];
};
