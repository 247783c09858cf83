/**
 * Cross-step state of one pipeline run
 *
 * Every field is written exactly once, by the step that declares it in
 * `produces`, and is read-only afterwards.
 */

import type { KnownIdentifiers } from '../lib/errors.js';
import type { ValidationRecord } from '../types.js';

export interface PipelineStateFields {
  outputDir: string;
  localPath: string;
  localFileCount: number;
  uploadedFileCount: number;
  uploadedKeys: readonly string[];
  certificateArn: string;
  validationRecords: readonly ValidationRecord[];
  hostedZoneId: string;
  validationChangeId: string;
  distributionId: string;
  distributionDomain: string;
  dnsChangeId: string;
}

export type StateField = keyof PipelineStateFields;

/**
 * Values a step hands back for the pipeline to commit
 */
export type StatePatch = Partial<PipelineStateFields>;

export const STATE_FIELDS: readonly StateField[] = [
  'outputDir',
  'localPath',
  'localFileCount',
  'uploadedFileCount',
  'uploadedKeys',
  'certificateArn',
  'validationRecords',
  'hostedZoneId',
  'validationChangeId',
  'distributionId',
  'distributionDomain',
  'dnsChangeId',
];

/**
 * Read access to state, as handed to a step
 */
export interface StateReader {
  get<K extends StateField>(field: K): PipelineStateFields[K];
}

export class PipelineState implements StateReader {
  private readonly values: StatePatch = {};
  /** 1-based index of the step currently running (0 before the first) */
  currentStep = 0;

  has(field: StateField): boolean {
    return this.values[field] !== undefined;
  }

  get<K extends StateField>(field: K): PipelineStateFields[K] {
    const value: PipelineStateFields[K] | undefined = this.values[field];
    if (value === undefined) {
      throw new Error(`State field "${field}" has not been written`);
    }
    return value;
  }

  set<K extends StateField>(field: K, value: PipelineStateFields[K]): void {
    if (this.has(field)) {
      throw new Error(`State field "${field}" is already set`);
    }
    this.values[field] = value;
  }

  /**
   * Commit every field present in `patch`
   */
  apply(patch: StatePatch): void {
    for (const field of STATE_FIELDS) {
      const value = patch[field];
      if (value !== undefined) {
        this.set(field, value);
      }
    }
  }

  /**
   * Identifiers of what already exists in the cloud, for failure reports
   */
  known(): KnownIdentifiers {
    const known: KnownIdentifiers = {};
    if (this.values.uploadedFileCount !== undefined) known.uploadedFileCount = this.values.uploadedFileCount;
    if (this.values.certificateArn !== undefined) known.certificateArn = this.values.certificateArn;
    if (this.values.hostedZoneId !== undefined) known.hostedZoneId = this.values.hostedZoneId;
    if (this.values.distributionId !== undefined) known.distributionId = this.values.distributionId;
    if (this.values.distributionDomain !== undefined) known.distributionDomain = this.values.distributionDomain;
    return known;
  }

  /**
   * View that only allows reading `allowed` fields
   */
  restrictTo(allowed: readonly StateField[], owner: string): StateReader {
    const permitted = new Set<StateField>(allowed);
    return {
      get: <K extends StateField>(field: K): PipelineStateFields[K] => {
        if (!permitted.has(field)) {
          throw new Error(`Step "${owner}" read undeclared state field "${field}"`);
        }
        return this.get(field);
      },
    };
  }
}
