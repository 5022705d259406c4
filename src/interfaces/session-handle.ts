/**
 * Capability surface of the external capture/encode/transport engine.
 *
 * The core never talks to a media engine directly; it drives one live
 * session through this interface and learns about it through
 * {@link TransportCallbacks}. Lifecycle calls may touch hardware or spawn
 * processes and are therefore async. Liveness queries are synchronous reads of
 * the engine's current flags.
 * @module
 */

export type CameraFacing = "front" | "back";

export interface SessionHandle {
  prepareVideo(
    width: number,
    height: number,
    fps: number,
    bitrateBps: number,
    keyframeIntervalSec: number,
    rotationDeg: number,
  ): Promise<boolean>;
  prepareAudio(
    bitrateBps: number,
    sampleRate: number,
    stereo: boolean,
    echoCancel: boolean,
    noiseSuppress: boolean,
  ): Promise<boolean>;
  startCapture(facing: CameraFacing): Promise<void>;
  startTransport(url: string): Promise<void>;
  stopTransport(): Promise<void>;
  stopCapture(): Promise<void>;
  /** Free every engine resource. Must be safe to call on an already stopped session. */
  release(): Promise<void>;

  /** Transport is publishing: set once startTransport launches it, before the handshake completes; cleared on stop or failure. */
  isStreaming(): boolean;
  /** Capture device is open and delivering frames. */
  isCapturing(): boolean;

  setBitrate(bps: number): void;
  switchFacing(): Promise<void>;
  setAudioMuted(muted: boolean): void;
  isTorchSupported(): boolean;
  setTorch(on: boolean): void;
}

/** Events the engine reports about the live session. */
export interface TransportCallbacks {
  connectionStarted(url: string): void;
  connectionSucceeded(): void;
  connectionFailed(reason: string): void;
  bitrateSample(bps: number): void;
  disconnected(): void;
  authError(): void;
  authSucceeded(): void;
}

/** Creates a fresh engine session bound to the given callbacks. */
export interface SessionFactory {
  createSession(callbacks: TransportCallbacks): SessionHandle;
}
