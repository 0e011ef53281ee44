/** Credentials and field hints for a single check, frozen after construction */
export interface LoginTarget {
  readonly loginUrl: string;
  readonly username: string;
  readonly password: string;
  readonly usernameField?: string;
  readonly passwordField?: string;
  readonly extraFields: Readonly<Record<string, string>>;
}

/** CLI configuration parsed from command-line arguments */
export interface CheckConfig {
  target: LoginTarget;
  insecure: boolean;
  json: boolean;
  quiet: boolean;
  timeout: number;
  maxRedirects: number;
  userAgent: string;
  allowDomains: string[];
  allowlistFile?: string;
  allowlistColumn?: string;
}

export type HttpMethod = "GET" | "POST";

/** A login form picked out of the fetched page */
export interface DetectedForm {
  actionUrl: string;
  method: HttpMethod;
  fieldNames: Set<string>;
  usernameField: string;
  passwordField: string;
  /** Values the form submits on its own: hidden inputs, prefilled values, checked boxes */
  defaults: Record<string, string>;
}

/** Outcome of scanning a page for a login form: discriminated union */
export type FormDetection =
  | { status: "found"; form: DetectedForm }
  | { status: "ambiguous"; reason: string }
  | { status: "absent"; reason: string };

export interface RedirectHop {
  url: string;
  status_code: number;
}

/** Final response of a request after every redirect has been followed */
export interface SubmissionResult {
  finalUrl: string;
  statusCode: number;
  responseHeaders: Record<string, string>;
  redirectChain: RedirectHop[];
}

export type Verdict = "SAME_DOMAIN" | "DIFFERENT_DOMAIN" | "ERROR";

export type CheckErrorKind =
  | "NoFormFound"
  | "AmbiguousForm"
  | "NetworkError"
  | "TLSError"
  | "DomainParseError"
  | "ConfigError";

export interface DomainComparison {
  verdict: Exclude<Verdict, "ERROR">;
  login_domain: string;
  final_domain: string;
  similarity: number;
  lookalike: boolean;
}

/** Everything one run produced, in the shape the JSON report prints */
export interface CheckReport {
  verdict: Verdict;
  login_url: string | null;
  login_domain: string | null;
  final_domain: string | null;
  final_url: string | null;
  status_code: number | null;
  redirect_chain: RedirectHop[];
  form: {
    action_url: string;
    method: HttpMethod;
    username_field: string;
    password_field: string;
  } | null;
  similarity: number | null;
  lookalike: boolean;
  final_domain_trusted: boolean;
  error: { kind: CheckErrorKind; message: string } | null;
}
