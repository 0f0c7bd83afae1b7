/**
 * Domain types for deposit agreement placeholder generation
 */

import type { IsoDate } from '../utils/dateUtils.js';

/**
 * Dataset-level access category
 */
export enum AccessCategory {
  OPEN_ACCESS = 'OPEN_ACCESS',
  ANONYMOUS_ACCESS = 'ANONYMOUS_ACCESS',
  FREELY_AVAILABLE = 'FREELY_AVAILABLE',
  OPEN_ACCESS_FOR_REGISTERED_USERS = 'OPEN_ACCESS_FOR_REGISTERED_USERS',
  GROUP_ACCESS = 'GROUP_ACCESS',
  REQUEST_PERMISSION = 'REQUEST_PERMISSION',
  ACCESS_ELSEWHERE = 'ACCESS_ELSEWHERE',
  NO_ACCESS = 'NO_ACCESS',
}

/**
 * Per-file access right
 */
export enum FileAccessRight {
  ANONYMOUS = 'ANONYMOUS',
  KNOWN = 'KNOWN',
  RESTRICTED_REQUEST = 'RESTRICTED_REQUEST',
  RESTRICTED_GROUP = 'RESTRICTED_GROUP',
  NONE = 'NONE',
}

export interface MetadataTerm {
  name: string;
  namespace: string;
}

export const ACCESS_RIGHTS_TERM: MetadataTerm = { name: 'accessRights', namespace: 'dcterms' };

/**
 * Opaque metadata value; only its string form is used
 */
export interface MetadataItem {
  toString(): string;
}

export interface DatasetDates {
  getSubmitted(): IsoDate[];
  getAvailable(): IsoDate[];
}

/**
 * Descriptive metadata of a dataset, as supplied by the metadata service
 */
export interface DatasetMetadata {
  getManagedDoi(): string | null;
  getPreferredTitle(): string;
  getDates(): DatasetDates;
  /** `null` or `undefined` when the dataset records no category */
  getAccessCategory(): AccessCategory | null | undefined;
  getTerm(term: MetadataTerm): MetadataItem[];
}

export interface Depositor {
  name: string;
  organization: string;
  address: string;
  postalCode: string;
  city: string;
  country: string;
  telephone: string;
  email: string;
}

export interface DatasetFile {
  path: string;
  checksum: string;
  accessibleTo: FileAccessRight;
  visibleTo: FileAccessRight;
}

/**
 * Metadata (repository) service collaborator
 */
export interface DatasetMetadataService {
  getMetadata(datasetId: string): Promise<DatasetMetadata>;
  getFiles(datasetId: string): Promise<DatasetFile[]>;
}

/**
 * Identity service collaborator
 */
export interface DepositorService {
  getDepositor(datasetId: string): Promise<Depositor>;
}

/**
 * Request-scoped settings for one agreement
 */
export interface AgreementParameters {
  readonly templateResourceDir: string;
  readonly datasetId: string;
  readonly isSample: boolean;
  readonly metadataService: DatasetMetadataService;
  readonly identityService: DepositorService;
}

export type PlaceholderRow = Record<string, string>;

export type PlaceholderValue = string | boolean | PlaceholderRow[];

export type PlaceholderMap = Record<string, PlaceholderValue>;
