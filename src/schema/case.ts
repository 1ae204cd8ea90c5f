/** Ordered field-number → value mapping of one message. Insertion order is wire order. */
export type FieldMap = Map<string, string>;
export type ReadonlyFieldMap = ReadonlyMap<string, string>;

export interface CaseTemplate {
  useCaseId: string;
  testCaseId: string;
  /** Field map literal in the human delimiter. */
  baseMessage: string;
  updateSpec: string;
  validateSpec: string;
  expectedOutcome: boolean;
  /** 1-based data row in the source file, when read from CSV. */
  rowNumber?: number;
}

export type CaseRole = "primary" | "secondary";

export interface ConcreteCase {
  readonly useCaseId: string;
  /** TestCaseID of the row this case was expanded from. */
  readonly templateId: string;
  /** Unique within a run; equals templateId when the row yields one primary. */
  readonly testCaseId: string;
  readonly baseMessage: ReadonlyFieldMap;
  /** An empty value deletes the field from the outbound message. */
  readonly updateMap: ReadonlyFieldMap;
  /** An empty value requires the field to be absent from the reply. */
  readonly validateMap: ReadonlyFieldMap;
  readonly expectedOutcome: boolean;
  readonly identifier: string;
  readonly role: CaseRole;
  readonly parentTestCaseId?: string;
}

export interface CorrelationKey {
  identifier: string;
  type: string;
}
