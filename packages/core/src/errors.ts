export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class UnknownBranchError extends Error {
  readonly branch: string;

  constructor(branch: string) {
    super(`Unknown branch: ${branch}`);
    this.name = "UnknownBranchError";
    this.branch = branch;
  }
}
