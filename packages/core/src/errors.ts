export interface StyleIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Error thrown when configuration does not describe a valid style for a mode.
 */
export class InvalidStyleError extends Error {
  constructor(
    /** Name of the mode the style was resolved for */
    public readonly mode: string,
    public readonly issues: readonly StyleIssue[]
  ) {
    const details = issues.map((issue) => ` - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
    super(`Invalid ${mode} style:\n${details}`);
    this.name = 'InvalidStyleError';
  }
}
