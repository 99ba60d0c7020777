export class StartupError extends Error {
  readonly code: string;
  readonly guidance: string;

  constructor(code: string, message: string, guidance: string) {
    super(message);
    this.name = 'StartupError';
    this.code = code;
    this.guidance = guidance;
  }
}

export class CaptureUnavailableError extends StartupError {
  constructor(camera: number | undefined, timeoutMs: number) {
    super(
      'capture_unavailable',
      `No capture device delivered a frame${camera === undefined ? '' : ` for camera ${camera}`} within ${timeoutMs}ms`,
      'Check that the depth camera is plugged in and the capture bridge is posting frames to /frame, or pass --no-camera for telemetry-only recording.'
    );
    this.name = 'CaptureUnavailableError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
