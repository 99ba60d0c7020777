import type { CameraFrame } from '../camera/types.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('pose');

export type PoseMode = 'none' | 'external';

export type Landmark = { x: number; y: number; visibility: number };

export type PoseLandmarks = {
  frameId: string;
  points: Landmark[];
};

export type PixelPoint = { u: number; v: number };

export type HandPositions = {
  left: PixelPoint | null;
  right: PixelPoint | null;
};

export interface LandmarkDetector {
  readonly mode: PoseMode;
  detect(frame: CameraFrame): Promise<PoseLandmarks | null>;
  handPositions(landmarks: PoseLandmarks | null, width: number, height: number): HandPositions;
  drawLandmarks(frame: CameraFrame, landmarks: PoseLandmarks | null): CameraFrame;
  drawHands(frame: CameraFrame, hands: HandPositions): CameraFrame;
}

/** Stand-in when no pose model is configured: finds nothing, draws nothing. */
export class NoopLandmarkDetector implements LandmarkDetector {
  readonly mode = 'none';

  async detect(): Promise<PoseLandmarks | null> {
    return null;
  }

  handPositions(): HandPositions {
    return { left: null, right: null };
  }

  drawLandmarks(frame: CameraFrame): CameraFrame {
    return frame;
  }

  drawHands(frame: CameraFrame): CameraFrame {
    return frame;
  }
}

/**
 * Uses the detector handed in by code that embeds a pose library, or the
 * no-op one when none is attached.
 */
export function createLandmarkDetector(external?: LandmarkDetector): LandmarkDetector {
  if (!external) {
    log.info('No landmark detector attached; hand tracking off');
    return new NoopLandmarkDetector();
  }
  log.info({ mode: external.mode }, 'Using attached landmark detector');
  return external;
}
