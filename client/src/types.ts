export type ApiKeyHeader = 'x-grafana-api-key' | 'bearer';

export interface ClientConfig {
  host: string;
  port: number;
  use_https: boolean;
  api_key?: string;
  api_key_header: ApiKeyHeader;
  auth_user?: string;
  auth_pass?: string;
  check_timeout_ms: number;
  send_timeout_ms: number;
}

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface TimeRange {
  from: string;
  to: string;
}

export interface TimePicker {
  hidden?: boolean;
  nowDelay?: string;
  collapse?: boolean;
  enable?: boolean;
}

export interface GridPos {
  x: number;
  y: number;
  w: number;
  h: number;
  static?: boolean;
}

export interface DataSourceRef {
  type?: string;
  uid?: string;
}

export interface Panel {
  type: string;
  id?: number;
  title?: string;
  description?: string;
  gridPos?: GridPos;
  datasource?: DataSourceRef | null;
  targets?: Record<string, unknown>[];
  options?: Record<string, unknown>;
  fieldConfig?: Record<string, unknown>;
  transparent?: boolean;
  pluginVersion?: string;
  collapsed?: boolean;
  panels?: Panel[];
}

export interface VariableModel {
  name: string;
  type: string;
  label?: string;
  query?: unknown;
  datasource?: DataSourceRef | null;
  current?: Record<string, unknown>;
  options?: unknown[];
  hide?: number;
  multi?: boolean;
  includeAll?: boolean;
}

export interface TemplatingContainer {
  list?: VariableModel[];
}

export interface AnnotationPanelFilter {
  exclude?: boolean;
  ids: number[];
}

export interface AnnotationQuery {
  name: string;
  datasource?: DataSourceRef | null;
  enable?: boolean;
  hide?: boolean;
  iconColor?: string;
  builtIn?: number;
  type?: string;
  filter?: AnnotationPanelFilter;
  target?: Record<string, unknown>;
}

export interface AnnotationContainer {
  list?: AnnotationQuery[];
}

export interface DashboardLink {
  title: string;
  type: 'link' | 'dashboards';
  icon?: string;
  tooltip?: string;
  url?: string;
  tags?: string[];
  asDropdown?: boolean;
  targetBlank?: boolean;
  includeVars?: boolean;
  keepTime?: boolean;
}

export interface Snapshot {
  key?: string;
  name?: string;
  orgId?: number;
  userId?: number;
  external?: boolean;
  externalUrl?: string;
  url?: string;
  expires?: string;
  created?: string;
  updated?: string;
}

/**
 * Visible dashboard content. Only `schemaVersion` is guaranteed; a key that is
 * present counts as explicitly set, including when it holds `null`.
 */
export interface Spec {
  id?: number | null;
  uid?: string | null;
  title?: string | null;
  description?: string | null;
  revision?: number | null;
  gnetId?: string | null;
  tags?: string[] | null;
  timezone?: string | null;
  editable?: boolean | null;
  graphTooltip?: number | null;
  time?: TimeRange | null;
  timepicker?: TimePicker | null;
  fiscalYearStartMonth?: number | null;
  liveNow?: boolean | null;
  weekStart?: string | null;
  refresh?: string | boolean | null;
  schemaVersion: number;
  version?: number | null;
  panels?: Panel[] | null;
  templating?: TemplatingContainer | null;
  annotations?: AnnotationContainer | null;
  links?: DashboardLink[] | null;
  snapshot?: Snapshot | null;
}

export type SpecFieldName = keyof Spec;

export interface Metadata {
  uid?: string;
  creationTimestamp?: string;
  deletionTimestamp?: string | null;
  finalizers?: string[];
  resourceVersion?: string;
  labels?: Record<string, string>;
  updateTimestamp?: string;
  createdBy?: string;
  updatedBy?: string;
  extraFields?: Record<string, unknown>;
}

/** Metadata as held between the merge and `validate()`. */
export type MetadataEntry =
  | { kind: 'resolved'; value: Metadata }
  | { kind: 'raw'; value: unknown };

export interface OperatorState {
  name: string;
  lastEvaluation?: string;
  state: 'success' | 'in_progress' | 'failed';
  descriptiveState?: string;
  details?: Record<string, unknown>;
}

export interface Status {
  operatorStates?: OperatorState[] | null;
  additionalFields?: Record<string, unknown> | null;
}

/** Caller intent handed to `DashboardDocument.from`. */
export interface DashboardInput extends Partial<Spec> {
  spec?: Partial<Spec> | Record<string, unknown>;
  metadata?: Metadata | Record<string, unknown> | null;
  status?: Status | Record<string, unknown> | null;
  [field: string]: unknown;
}

/**
 * Flat wire form of a dashboard: every Spec field present, sequences never
 * `null`. Metadata and Status have no place in it.
 */
export type PublishedSpecView = Record<string, unknown>;

export interface LocalRepresentation {
  metadata: unknown;
  spec: Record<string, unknown>;
  status: Status;
}

export interface Datasource {
  id?: number;
  uid?: string;
  name: string;
  type: string;
  url?: string;
  access?: 'proxy' | 'direct';
  isDefault?: boolean;
  basicAuth?: boolean;
  jsonData?: Record<string, unknown>;
  secureJsonData?: Record<string, unknown>;
}

export interface ResponseDiagnostics {
  status: number;
  ok: boolean;
  message?: string;
  body?: unknown;
  text?: string;
}

export interface HealthReport {
  reachable: boolean;
  status: number | null;
  database?: string;
  version?: string;
  error?: string;
}

export interface AuthReport {
  ok: boolean;
  status: number | null;
  method: 'api-key' | 'basic' | 'none';
  api_key_preview?: string;
  datasource_count?: number;
  message?: string;
  error?: string;
}
