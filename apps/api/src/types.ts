// Rows as they are stored. Flags are 0/1 integers and dates ISO-8601 text in every dialect.

export interface PromptRow {
  id: number;
  date: string;
  prompt: string;
  tags: string | null;
}

export interface ModelRow {
  id: number;
  name: string;
  api_url: string;
  api_id: string;
  model_name: string | null;
  is_active: number;
}

export interface ResultRow {
  id: number;
  prompt_id: number;
  model_id: number;
  response: string;
  date: string;
  selected: number;
  error_kind: string | null;
}

export interface SettingRow {
  key: string;
  value: string;
}

export interface Prompt {
  id: number;
  createdAt: Date;
  text: string;
  tags: string[];
}

export interface Model {
  id: number;
  name: string;
  apiUrl: string;
  credentialKey: string;
  modelName: string | null;
  isActive: boolean;
}

export const DISPATCH_ERROR_KINDS = ['MissingCredential', 'NetworkError', 'Timeout', 'Cancelled'] as const;

export type DispatchErrorKind = (typeof DISPATCH_ERROR_KINDS)[number];

export interface Result {
  id: number;
  promptId: number;
  modelId: number;
  responseText: string;
  createdAt: Date;
  selected: boolean;
  errorKind: DispatchErrorKind | null;
}

export interface ResultWithModel extends Result {
  modelName: string;
}

export interface SelectedResult extends ResultWithModel {
  promptText: string;
}

interface OutcomeBase {
  modelId: number;
  modelName: string;
  elapsedMs: number;
  /** Id of the stored result, or null when nothing was written. */
  resultId: number | null;
  persistError: string | null;
}

export interface SuccessOutcome extends OutcomeBase {
  status: 'success';
  responseText: string;
  truncated: boolean;
}

export interface FailureOutcome extends OutcomeBase {
  status: 'failure';
  errorKind: DispatchErrorKind;
  errorMessage: string;
  cause?: unknown;
}

export type DispatchOutcome = SuccessOutcome | FailureOutcome;
