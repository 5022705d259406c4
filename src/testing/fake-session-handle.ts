import type {
  CameraFacing,
  SessionFactory,
  SessionHandle,
  TransportCallbacks,
} from "../interfaces/session-handle.js";

/**
 * In-memory engine session. Liveness flags and prepare results are plain
 * fields a test flips directly; every call is recorded in `calls`.
 */
export class FakeSessionHandle implements SessionHandle {
  readonly calls: string[] = [];
  streaming = false;
  capturing = false;
  videoOk = true;
  audioOk = true;
  torchSupported = true;
  /** Thrown from the named lifecycle call, once set. */
  failOn: string | null = null;
  bitrateBps = 0;
  muted = false;
  torchOn = false;
  facing: CameraFacing | null = null;
  released = false;

  constructor(readonly callbacks: TransportCallbacks) {}

  async prepareVideo(
    width: number,
    height: number,
    fps: number,
    bitrateBps: number,
    keyframeIntervalSec: number,
    rotationDeg: number,
  ): Promise<boolean> {
    this.record(
      `prepareVideo(${width},${height},${fps},${bitrateBps},${keyframeIntervalSec},${rotationDeg})`,
    );
    this.bitrateBps = bitrateBps;
    return this.videoOk;
  }

  async prepareAudio(bitrateBps: number, sampleRate: number): Promise<boolean> {
    this.record(`prepareAudio(${bitrateBps},${sampleRate})`);
    return this.audioOk;
  }

  async startCapture(facing: CameraFacing): Promise<void> {
    this.record(`startCapture(${facing})`);
    this.facing = facing;
    this.capturing = true;
  }

  async startTransport(url: string): Promise<void> {
    this.record(`startTransport(${url})`);
    this.streaming = true;
  }

  async stopTransport(): Promise<void> {
    this.record("stopTransport");
    this.streaming = false;
  }

  async stopCapture(): Promise<void> {
    this.record("stopCapture");
    this.capturing = false;
  }

  async release(): Promise<void> {
    this.record("release");
    this.released = true;
  }

  isStreaming(): boolean {
    return this.streaming;
  }

  isCapturing(): boolean {
    return this.capturing;
  }

  setBitrate(bps: number): void {
    this.calls.push(`setBitrate(${bps})`);
    this.bitrateBps = bps;
  }

  async switchFacing(): Promise<void> {
    this.record("switchFacing");
    this.facing = this.facing === "front" ? "back" : "front";
  }

  setAudioMuted(muted: boolean): void {
    this.calls.push(`setAudioMuted(${muted})`);
    this.muted = muted;
  }

  isTorchSupported(): boolean {
    return this.torchSupported;
  }

  setTorch(on: boolean): void {
    this.calls.push(`setTorch(${on})`);
    this.torchOn = on;
  }

  // ── Test drivers ──

  /** Mark the transport live and report it, as an engine would on connect. */
  connect(): void {
    this.streaming = true;
    this.callbacks.connectionSucceeded();
  }

  private record(call: string): void {
    this.calls.push(call);
    const name = call.split("(")[0];
    if (this.failOn === name) throw new Error(`${name} failed`);
  }
}

/** Factory handing out {@link FakeSessionHandle}s; `configure` runs on each before use. */
export class FakeSessionFactory implements SessionFactory {
  readonly sessions: FakeSessionHandle[] = [];

  constructor(private readonly configure?: (session: FakeSessionHandle) => void) {}

  createSession(callbacks: TransportCallbacks): FakeSessionHandle {
    const session = new FakeSessionHandle(callbacks);
    this.configure?.(session);
    this.sessions.push(session);
    return session;
  }

  get last(): FakeSessionHandle | undefined {
    return this.sessions[this.sessions.length - 1];
  }
}
