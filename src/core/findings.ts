/**
 * Finding model for breaking change detection
 * A finding records one difference between an original and an updated schema element
 */

/**
 * Kind of difference a finding describes
 */
export enum FindingCategory {
  FIELD_ADDITION = 'FIELD_ADDITION',
  FIELD_REMOVAL = 'FIELD_REMOVAL',
  FIELD_NAME_CHANGE = 'FIELD_NAME_CHANGE',
  FIELD_REPEATED_CHANGE = 'FIELD_REPEATED_CHANGE',
  FIELD_BEHAVIOR_CHANGE = 'FIELD_BEHAVIOR_CHANGE',
  FIELD_TYPE_CHANGE = 'FIELD_TYPE_CHANGE',
  FIELD_ONEOF_REMOVAL = 'FIELD_ONEOF_REMOVAL',
  FIELD_ONEOF_ADDITION = 'FIELD_ONEOF_ADDITION',
  FIELD_PROTO3_OPTIONAL_CHANGE = 'FIELD_PROTO3_OPTIONAL_CHANGE',
  RESOURCE_REFERENCE_ADDITION = 'RESOURCE_REFERENCE_ADDITION',
  RESOURCE_REFERENCE_REMOVAL = 'RESOURCE_REFERENCE_REMOVAL',
  RESOURCE_REFERENCE_CHANGE = 'RESOURCE_REFERENCE_CHANGE',
  ENUM_VALUE_ADDITION = 'ENUM_VALUE_ADDITION',
  ENUM_VALUE_REMOVAL = 'ENUM_VALUE_REMOVAL',
  ENUM_VALUE_NAME_CHANGE = 'ENUM_VALUE_NAME_CHANGE',
  ENUM_ADDITION = 'ENUM_ADDITION',
  ENUM_REMOVAL = 'ENUM_REMOVAL',
  MESSAGE_ADDITION = 'MESSAGE_ADDITION',
  MESSAGE_REMOVAL = 'MESSAGE_REMOVAL'
}

/**
 * Severity of a finding. MAJOR is breaking; MINOR and PATCH are informational.
 */
export enum ChangeType {
  MAJOR = 'MAJOR',
  MINOR = 'MINOR',
  PATCH = 'PATCH'
}

export interface SourceLocation {
  file: string;
  /** 1-based line, 0 when the descriptor carried no source info */
  line: number;
}

export interface Finding {
  readonly category: FindingCategory;
  readonly changeType: ChangeType;
  readonly message: string;
  readonly location: Readonly<SourceLocation>;
  readonly actionable: boolean;
}

export interface NewFinding {
  category: FindingCategory;
  changeType: ChangeType;
  message: string;
  file: string;
  line: number;
}

/**
 * Serialized finding as written by report tooling
 */
export interface FindingRecord {
  category: string;
  change_type: string;
  message: string;
  location: {
    proto_file_name: string;
    source_code_line: number;
  };
  actionable: boolean;
}

export function createFinding(init: NewFinding): Finding {
  return Object.freeze({
    category: init.category,
    changeType: init.changeType,
    message: init.message,
    location: Object.freeze({ file: init.file, line: init.line }),
    actionable: init.changeType === ChangeType.MAJOR
  });
}

export function toFindingRecord(finding: Finding): FindingRecord {
  return {
    category: finding.category,
    change_type: finding.changeType,
    message: finding.message,
    location: {
      proto_file_name: finding.location.file,
      source_code_line: finding.location.line
    },
    actionable: finding.actionable
  };
}

/**
 * Append-only accumulator that comparators write findings into.
 * Each comparison run owns its own container; concurrent runs merge afterwards.
 */
export class FindingContainer {
  private findings: Finding[] = [];

  addFinding(init: NewFinding): Finding {
    const finding = createFinding(init);
    this.findings.push(finding);
    return finding;
  }

  /**
   * All findings in the order they were added
   */
  getAllFindings(): readonly Finding[] {
    return [...this.findings];
  }

  /**
   * Breaking (MAJOR) findings only
   */
  getActionableFindings(): readonly Finding[] {
    return this.findings.filter(finding => finding.actionable);
  }

  get size(): number {
    return this.findings.length;
  }

  /**
   * Append every finding of another container, keeping its order
   */
  merge(other: FindingContainer): void {
    this.findings.push(...other.findings);
  }

  reset(): void {
    this.findings = [];
  }

  toJSON(): FindingRecord[] {
    return this.findings.map(toFindingRecord);
  }
}
