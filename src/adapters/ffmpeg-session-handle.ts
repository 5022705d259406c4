/**
 * ffmpeg-backed media engine.
 *
 * One `ffmpeg` child process per transport start: it captures from the
 * configured input device, encodes with libx264/aac and publishes to the
 * target. Progress arrives on stdout as `key=value` blocks (`-progress
 * pipe:1`); diagnostics arrive on stderr.
 *
 * ffmpeg cannot retune a running encode, so bitrate, mute and facing changes
 * are stored and take effect on the next transport start. There is no torch.
 *
 * @module Engine
 */

import { EngineError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessHandle, ProcessManager } from "../interfaces/process-manager.js";
import type {
  CameraFacing,
  SessionFactory,
  SessionHandle,
  TransportCallbacks,
} from "../interfaces/session-handle.js";
import { LineBuffer } from "../utils/line-buffer.js";
import { noopLogger } from "./noop-logger.js";

const AUTH_FAILURE_RE =
  /authentication failed|unauthori[sz]ed|NetConnection\.Connect\.Rejected|\b40[13]\b/i;
const DEVICE_FAILURE_RE =
  /(?:cannot|could not|can't) open (?:video |audio )?device|no such device|device or resource busy|input\/output error/i;
const BITRATE_RE = /^([\d.]+)\s*kbits\/s$/;

// ── Options ──

export interface FfmpegInputConfig {
  /** ffmpeg input format for the video device (`v4l2`, `avfoundation`, `dshow`, `lavfi`). */
  inputFormat: string;
  /** Video input per facing. At least the back device is required. */
  devices: { back: string; front?: string };
  /** Audio input; without it prepareAudio reports false and the stream is video only. */
  audioInputFormat?: string;
  audioDevice?: string;
  /** Defaults to `ffmpeg` on PATH. */
  ffmpegPath?: string;
}

export interface FfmpegEngineOptions extends FfmpegInputConfig {
  processManager: ProcessManager;
  logger?: Logger;
  /** Grace period (ms) before escalating SIGTERM to SIGKILL. */
  killGracePeriodMs?: number;
}

export interface VideoParams {
  width: number;
  height: number;
  fps: number;
  bitrateBps: number;
  keyframeIntervalSec: number;
  rotationDeg: number;
}

export interface AudioParams {
  bitrateBps: number;
  sampleRate: number;
  stereo: boolean;
  echoCancel: boolean;
  noiseSuppress: boolean;
}

export interface FfmpegArgsInput {
  inputFormat: string;
  videoDevice: string;
  video: VideoParams;
  audio: { format: string; device: string; params: AudioParams; muted: boolean } | null;
  url: string;
}

// ── Argument building ──

function rotationFilter(deg: number): string | null {
  switch (deg) {
    case 90:
      return "transpose=1";
    case 180:
      return "hflip,vflip";
    case 270:
      return "transpose=2";
    default:
      return null;
  }
}

/** Output container for the target: SRT carries MPEG-TS, everything else FLV. */
export function containerFor(url: string): "flv" | "mpegts" {
  return url.toLowerCase().startsWith("srt://") ? "mpegts" : "flv";
}

export function buildFfmpegArgs(input: FfmpegArgsInput): string[] {
  const { video, audio } = input;
  const args = ["-hide_banner", "-loglevel", "warning", "-nostats", "-progress", "pipe:1"];

  args.push(
    "-f",
    input.inputFormat,
    "-framerate",
    String(video.fps),
    "-video_size",
    `${video.width}x${video.height}`,
    "-i",
    input.videoDevice,
  );
  if (audio) args.push("-f", audio.format, "-i", audio.device);

  args.push("-map", "0:v");
  if (audio) args.push("-map", "1:a");

  args.push(
    "-c:v",
    "libx264",
    "-preset",
    "veryfast",
    "-tune",
    "zerolatency",
    "-pix_fmt",
    "yuv420p",
    "-b:v",
    String(video.bitrateBps),
    "-maxrate",
    String(video.bitrateBps),
    "-bufsize",
    String(video.bitrateBps * 2),
    "-g",
    String(Math.max(1, Math.round(video.fps * video.keyframeIntervalSec))),
  );
  const vf = rotationFilter(video.rotationDeg);
  if (vf) args.push("-vf", vf);

  if (audio) {
    args.push(
      "-c:a",
      "aac",
      "-b:a",
      String(audio.params.bitrateBps),
      "-ar",
      String(audio.params.sampleRate),
      "-ac",
      audio.params.stereo ? "2" : "1",
    );
    const filters: string[] = [];
    if (audio.params.noiseSuppress) filters.push("afftdn");
    if (audio.muted) filters.push("volume=0");
    if (filters.length > 0) args.push("-af", filters.join(","));
  }

  args.push("-f", containerFor(input.url), input.url);
  return args;
}

/** Parse an ffmpeg progress `bitrate=` value (`1234.5kbits/s`) into bps; null for `N/A`. */
export function parseProgressBitrate(value: string): number | null {
  const match = BITRATE_RE.exec(value.trim());
  if (!match) return null;
  const kbps = Number(match[1]);
  return Number.isFinite(kbps) ? Math.round(kbps * 1000) : null;
}

// ── Session handle ──

export class FfmpegSessionHandle implements SessionHandle {
  private readonly logger: Logger;
  private readonly killGracePeriodMs: number;

  private video: VideoParams | null = null;
  private audio: AudioParams | null = null;
  private facing: CameraFacing = "back";
  private capturing = false;
  private captureLost = false;
  private muted = false;

  private proc: ProcessHandle | null = null;
  private streaming = false;
  // Processes whose exit was asked for; their exit reports `disconnected`
  private readonly stopRequested = new WeakSet<ProcessHandle>();

  constructor(
    private readonly options: FfmpegEngineOptions,
    private readonly callbacks: TransportCallbacks,
  ) {
    this.logger = options.logger ?? noopLogger;
    this.killGracePeriodMs = options.killGracePeriodMs ?? 5000;
  }

  async prepareVideo(
    width: number,
    height: number,
    fps: number,
    bitrateBps: number,
    keyframeIntervalSec: number,
    rotationDeg: number,
  ): Promise<boolean> {
    const positive = [width, height, fps, bitrateBps, keyframeIntervalSec];
    if (!positive.every((v) => Number.isFinite(v) && v > 0)) {
      this.logger.warn("Rejected video parameters", { width, height, fps, bitrateBps });
      return false;
    }
    this.video = { width, height, fps, bitrateBps, keyframeIntervalSec, rotationDeg };
    return true;
  }

  async prepareAudio(
    bitrateBps: number,
    sampleRate: number,
    stereo: boolean,
    echoCancel: boolean,
    noiseSuppress: boolean,
  ): Promise<boolean> {
    if (!this.options.audioDevice || !this.options.audioInputFormat) return false;
    if (!(bitrateBps > 0 && sampleRate > 0)) return false;
    if (echoCancel) this.logger.debug?.("Echo cancellation is not available with ffmpeg capture");
    this.audio = { bitrateBps, sampleRate, stereo, echoCancel, noiseSuppress };
    return true;
  }

  async startCapture(facing: CameraFacing): Promise<void> {
    this.deviceFor(facing);
    this.facing = facing;
    this.capturing = true;
    this.captureLost = false;
  }

  async startTransport(url: string): Promise<void> {
    const video = this.video;
    if (!video) throw new EngineError("Video encoder not prepared");
    if (!this.capturing) throw new EngineError("Capture not started");
    if (this.proc) throw new EngineError("Transport already running");

    const audioFormat = this.options.audioInputFormat;
    const audioDevice = this.options.audioDevice;
    const args = buildFfmpegArgs({
      inputFormat: this.options.inputFormat,
      videoDevice: this.deviceFor(this.facing),
      video,
      audio:
        this.audio && audioFormat && audioDevice
          ? { format: audioFormat, device: audioDevice, params: this.audio, muted: this.muted }
          : null,
      url,
    });

    let proc: ProcessHandle;
    try {
      proc = this.options.processManager.spawn({
        command: this.options.ffmpegPath ?? "ffmpeg",
        args,
      });
    } catch (err) {
      throw new EngineError(`Failed to spawn ffmpeg: ${errorMessage(err)}`, { cause: err });
    }

    this.proc = proc;
    this.streaming = true;
    this.logger.info("ffmpeg started", { pid: proc.pid, url });
    this.callbacks.connectionStarted(url);
    this.watch(proc);
  }

  async stopTransport(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.stopRequested.add(proc);
    this.streaming = false;

    proc.kill("SIGTERM");

    let killTimer: ReturnType<typeof setTimeout> | undefined;
    const exited = await Promise.race([
      proc.exited.then(() => true),
      new Promise<false>((resolve) => {
        killTimer = setTimeout(() => resolve(false), this.killGracePeriodMs);
      }),
    ]);
    if (killTimer !== undefined) clearTimeout(killTimer);

    if (!exited) {
      this.logger.info("Force-killing ffmpeg", { pid: proc.pid });
      proc.kill("SIGKILL");
    }
    if (this.proc === proc) this.proc = null;
  }

  async stopCapture(): Promise<void> {
    this.capturing = false;
  }

  async release(): Promise<void> {
    await this.stopTransport();
    this.capturing = false;
    this.video = null;
    this.audio = null;
  }

  isStreaming(): boolean {
    return this.streaming;
  }

  isCapturing(): boolean {
    return this.capturing && !this.captureLost;
  }

  setBitrate(bps: number): void {
    if (this.video) this.video = { ...this.video, bitrateBps: bps };
    this.logger.debug?.("Bitrate change applies on next transport start", { bps });
  }

  async switchFacing(): Promise<void> {
    const next: CameraFacing = this.facing === "back" ? "front" : "back";
    this.deviceFor(next);
    this.facing = next;
    this.logger.debug?.("Facing change applies on next transport start", { facing: next });
  }

  setAudioMuted(muted: boolean): void {
    this.muted = muted;
  }

  isTorchSupported(): boolean {
    return false;
  }

  setTorch(on: boolean): void {
    this.logger.debug?.("Torch not supported", { on });
  }

  // ── Process output ──

  private deviceFor(facing: CameraFacing): string {
    const device = this.options.devices[facing];
    if (!device) throw new EngineError(`No capture device configured for the ${facing} camera`);
    return device;
  }

  private watch(proc: ProcessHandle): void {
    let lastStderrLine: string | null = null;
    let authReported = false;
    let connected = false;

    const onProgress = (key: string, value: string) => {
      if (proc !== this.proc) return;
      if (key === "bitrate") {
        const bps = parseProgressBitrate(value);
        if (bps !== null) this.callbacks.bitrateSample(bps);
      } else if (key === "progress" && !connected) {
        connected = true;
        this.callbacks.connectionSucceeded();
      }
    };

    const onStderr = (line: string) => {
      lastStderrLine = line;
      this.logger.debug?.("ffmpeg", { line });
      if (!authReported && AUTH_FAILURE_RE.test(line)) {
        authReported = true;
        this.callbacks.authError();
      }
      if (DEVICE_FAILURE_RE.test(line)) this.captureLost = true;
    };

    const stdoutDone = proc.stdout
      ? this.readLines(proc.stdout, (line) => {
          const eq = line.indexOf("=");
          if (eq > 0) onProgress(line.slice(0, eq), line.slice(eq + 1));
        })
      : Promise.resolve();
    const stderrDone = proc.stderr ? this.readLines(proc.stderr, onStderr) : Promise.resolve();

    proc.exited
      .then(async (code) => {
        // Let the pipes drain so the failure reason is the real last line
        await Promise.allSettled([stdoutDone, stderrDone]);
        this.logger.info("ffmpeg exited", { pid: proc.pid, code });
        if (this.proc === proc) {
          this.proc = null;
          this.streaming = false;
        }
        if (this.stopRequested.has(proc)) {
          this.callbacks.disconnected();
        } else {
          this.callbacks.connectionFailed(lastStderrLine ?? `ffmpeg exited with code ${code}`);
        }
      })
      .catch((err: unknown) => {
        this.logger.error("ffmpeg exit handling failed", { error: err });
      });
  }

  private async readLines(
    stream: ReadableStream<Uint8Array>,
    onLine: (line: string) => void,
  ): Promise<void> {
    const reader = stream.getReader();
    const lines = new LineBuffer();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        for (const line of lines.feed(value)) onLine(line);
      }
      const rest = lines.flush();
      if (rest) onLine(rest);
    } catch (err) {
      this.logger.debug?.("ffmpeg pipe closed", { error: errorMessage(err) });
    } finally {
      reader.releaseLock();
    }
  }
}

/** Creates one {@link FfmpegSessionHandle} per session. */
export class FfmpegSessionFactory implements SessionFactory {
  constructor(private readonly options: FfmpegEngineOptions) {}

  createSession(callbacks: TransportCallbacks): SessionHandle {
    return new FfmpegSessionHandle(this.options, callbacks);
  }
}
