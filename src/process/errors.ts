export class LaunchFailedError extends Error {
  public constructor(
    public readonly service: string,
    public readonly command: string,
    cause?: unknown,
  ) {
    super(
      `Failed to launch ${service} (${command}): ${cause instanceof Error ? cause.message : String(cause ?? 'unknown error')}`,
      { cause },
    );
    this.name = 'LaunchFailedError';
  }
}
