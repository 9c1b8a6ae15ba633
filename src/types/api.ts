/**
 * Zoho CRM API 型別定義
 */

// ============================================================
// Field Metadata
// ============================================================

export interface FieldMeta {
  api_name: string;
  data_type?: string;
  field_label?: string;
  display_label?: string;
  id?: string;
  system_mandatory?: boolean;
  read_only?: boolean;
}

export interface FieldsResponse {
  fields?: FieldMeta[];
}

// ============================================================
// Bulk Read
// ============================================================

/** Bulk read job 狀態 */
export type BulkJobState = 'ADDED' | 'QUEUED' | 'IN PROGRESS' | 'COMPLETED' | 'FAILURE' | 'FAILED';

/** 篩選比較子 */
export const BULK_COMPARATORS = [
  'equal',
  'not_equal',
  'in',
  'not_in',
  'less_than',
  'less_equal',
  'greater_than',
  'greater_equal',
  'contains',
  'not_contains',
  'starts_with',
  'ends_with',
  'between',
  'not_between',
] as const;

export type BulkComparator = (typeof BULK_COMPARATORS)[number];

export interface BulkCriteria {
  field: { api_name: string };
  comparator: BulkComparator;
  value: string | string[];
}

export interface BulkReadQuery {
  module: { api_name: string };
  fields?: string[];
  criteria?: BulkCriteria;
  page?: number;
  page_token?: string;
}

export type BulkFileType = 'csv' | 'ics';

export interface BulkReadRequest {
  query: BulkReadQuery;
  file_type?: BulkFileType;
}

export interface BulkReadCreateResponse {
  data?: Array<{
    status: string;
    code: string;
    message: string;
    details?: {
      id?: string;
      operation?: string;
      state?: BulkJobState;
      created_time?: string;
    };
  }>;
}

export interface BulkReadResult {
  page: number;
  count: number;
  download_url: string;
  per_page: number;
  more_records: boolean;
  next_page_token?: string | null;
}

export interface BulkReadJob {
  id: string;
  operation?: string;
  state: BulkJobState | string;
  query?: BulkReadQuery;
  created_time?: string;
  file_type?: BulkFileType;
  result?: BulkReadResult;
}

export interface BulkReadJobResponse {
  data?: BulkReadJob[];
}

// ============================================================
// Delete Records
// ============================================================

export interface DeleteRecordResult {
  code: string;
  status: 'success' | 'error' | string;
  message: string;
  details?: { id?: string } & Record<string, unknown>;
}

export interface DeleteRecordsResponse {
  data?: DeleteRecordResult[];
}

// ============================================================
// Job History
// ============================================================

/** 建立 bulk read job 時寫入的紀錄（只寫不讀） */
export interface JobRecord {
  name: string;
  id: string;
  module: string;
  createdAt: string;
}
