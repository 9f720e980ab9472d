/**
 * Type definitions for reconpipe
 */

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type OutputFormat = 'text' | 'json';

export type PortProfile = 'common' | 'top' | 'full';

/**
 * What to do with hosts whose addresses match the wildcard probe
 */
export type WildcardPolicy = 'keep' | 'drop';

/**
 * Stage identifiers, in pipeline order
 */
export type StageName = 'subdomains' | 'ports' | 'technologies' | 'screenshots';

/**
 * Pipeline phases. Technologies and screenshots both run in the enrichment phase.
 */
export type PhaseName = 'subdomains' | 'ports' | 'enrichment';

export type PipelineState =
  | 'init'
  | 'subdomains'
  | 'ports'
  | 'enrichment'
  | 'report'
  | 'done'
  | 'failed';

/**
 * One flag per stage plus the report. A disabled stage still records an empty output.
 */
export interface PhaseConfig {
  subdomains: boolean;
  ports: boolean;
  technologies: boolean;
  screenshots: boolean;
  report: boolean;
}

/**
 * Raw application configuration, as given by the CLI or a library caller
 */
export interface AppConfig {
  domain: string;
  workers?: number;
  timeout?: number;
  bannerTimeout?: number;
  enrichmentTimeout?: number;
  screenshotTimeout?: number;
  retries?: number;
  wordlist?: string;
  ports?: number[];
  portProfile?: PortProfile;
  output?: string;
  format?: OutputFormat;
  phases?: Partial<PhaseConfig>;
  nmap?: boolean;
  whatweb?: boolean;
  certificateTransparency?: boolean;
  validateHttp?: boolean;
  activeOnly?: boolean;
  wildcardPolicy?: WildcardPolicy;
  dnsServers?: string[];
  chromePath?: string;
  maxRunTime?: number;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Validated, fully defaulted configuration for one run
 */
export interface ScanConfig {
  target: string;
  workers: number;
  timeoutMs: number;
  bannerTimeoutMs: number;
  enrichmentTimeoutMs: number;
  screenshotTimeoutMs: number;
  retries: number;
  retryDelayMs: number;
  wordlistPath?: string;
  ports?: number[];
  portProfile: PortProfile;
  outputDir: string;
  format: OutputFormat;
  phases: PhaseConfig;
  nmap: boolean;
  whatweb: boolean;
  certificateTransparency: boolean;
  validateHttp: boolean;
  activeOnly: boolean;
  wildcardPolicy: WildcardPolicy;
  dnsServers: string[];
  chromePath?: string;
  maxRunTimeMs?: number;
  quiet: boolean;
  verbose: boolean;
}

export type ResolutionFailureKind = 'nxdomain' | 'nodata' | 'timeout' | 'servfail' | 'refused' | 'error';

/**
 * Outcome of resolving a hostname. A failed lookup is data, not an exception.
 */
export interface ResolvedHost {
  hostname: string;
  addresses: string[];
  success: boolean;
  failure?: ResolutionFailureKind;
}

export type CandidateSource = 'target' | 'wordlist' | 'crt.sh';

export interface Candidate {
  hostname: string;
  source: CandidateSource;
}

export interface DiscoveredHost extends ResolvedHost {
  source: CandidateSource;
  wildcard: boolean;
}

export interface WildcardInfo {
  detected: boolean;
  probe: string;
  addresses: string[];
}

/**
 * Subdomain stage output
 */
export interface DiscoveryOutput {
  candidates: number;
  hosts: DiscoveredHost[];
  /** Hosts answering HTTP with status < 400, or null when validation did not run */
  active: string[] | null;
  failures: Partial<Record<ResolutionFailureKind, number>>;
  wildcard: WildcardInfo | null;
}

export type PortState = 'open' | 'closed' | 'filtered';

export interface PortResult {
  host: string;
  address: string;
  port: number;
  state: PortState;
  banner?: string;
  service: string;
  source: 'tcp' | 'nmap';
  reason?: string;
  latencyMs?: number;
}

export interface HostPortScan {
  hostname: string;
  address: string;
  /** partial when some ports could not be probed */
  status: 'complete' | 'partial';
  ports: PortResult[];
}

export interface PortScanOutput {
  hosts: HostPortScan[];
  portsPerHost: number;
}

export type TechCategory =
  | 'web_server'
  | 'frameworks'
  | 'cms'
  | 'programming_languages'
  | 'databases'
  | 'cdn'
  | 'analytics'
  | 'security'
  | 'other';

export interface DetectedTechnology {
  name: string;
  category: TechCategory;
  source: 'headers' | 'content' | 'cookies' | 'whatweb';
}

export type TechResult =
  | { url: string; status: 'success'; statusCode: number; technologies: DetectedTechnology[] }
  | { url: string; status: 'failed'; error: string };

/**
 * What the captured page looked like to a plain HTTP client
 */
export interface PageInfo {
  title: string | null;
  /** URL after redirects */
  finalUrl: string;
  statusCode: number;
  /** Characters of page source read */
  sourceLength: number;
  capturedAt: string;
}

export type ScreenshotResult =
  | { url: string; status: 'success'; path: string; page?: PageInfo }
  | { url: string; status: 'failed'; error: string };

/**
 * Output type of each stage, keyed by stage name
 */
export interface StageOutputs {
  subdomains: DiscoveryOutput;
  ports: PortScanOutput;
  technologies: TechResult[];
  screenshots: ScreenshotResult[];
}

export type PhaseStatus = 'success' | 'partial' | 'failed' | 'skipped' | 'cancelled';

export interface PhaseRecord {
  stage: StageName;
  phase: PhaseName;
  status: PhaseStatus;
  startedAt: string;
  durationMs: number;
  warnings: string[];
  error?: string;
}

export interface ScanCounts {
  candidates: number;
  hosts: number;
  openPorts: number;
  technologies: number;
  endpointsFingerprinted: number;
  endpointsFailed: number;
  screenshots: number;
  screenshotsFailed: number;
}

/**
 * Aggregate of one run. Stage slots are null until the stage has been reached.
 */
export interface ScanResult {
  target: string;
  targetHost: ResolvedHost | null;
  state: PipelineState;
  transitions: PipelineState[];
  startedAt: string;
  finishedAt: string | null;
  durationMs: number;
  interrupted: boolean;
  error?: string;
  phases: PhaseRecord[];
  subdomains: DiscoveryOutput | null;
  ports: PortScanOutput | null;
  technologies: TechResult[] | null;
  screenshots: ScreenshotResult[] | null;
  counts: ScanCounts;
  reports: string[];
}

/**
 * Cache entry
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}
