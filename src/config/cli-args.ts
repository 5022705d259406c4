import { ConfigError } from "../errors.js";
import type { ReconnectPolicyKind } from "../types/config.js";

export interface CliConfig {
  url: string;
  inputFormat: string;
  deviceBack: string;
  deviceFront?: string;
  audioFormat?: string;
  audioDevice?: string;
  ffmpegPath: string;
  /** Status channel port; omitted means no status channel. */
  statusPort?: number;
  policy: ReconnectPolicyKind;
  width?: number;
  height?: number;
  fps?: number;
  bitrateKbps?: number;
  verbose: boolean;
  /** Human-readable console logs instead of JSON lines. */
  pretty: boolean;
}

export type CliParseResult = { kind: "help" } | { kind: "run"; config: CliConfig };

export const HELP_TEXT = `
  streamkeeper — keep a live RTMP/SRT publish healthy

  Usage: streamkeeper --url <target> [options]

  Options:
    --url <target>          Publish target (rtmp://, rtmps://, srt://)
    --input-format <fmt>    ffmpeg video input format (default: v4l2)
    --device-back <dev>     Back camera device (default: /dev/video0)
    --device-front <dev>    Front camera device
    --audio-format <fmt>    ffmpeg audio input format (e.g. alsa, pulse)
    --audio-device <dev>    Audio input device
    --ffmpeg <path>         ffmpeg binary (default: "ffmpeg")
    --size <WxH>            Video size (default: 1920x1080)
    --fps <n>               Frame rate (default: 30)
    --bitrate <kbps>        Video bitrate (default: 4000)
    --status-port <n>       Serve the status channel on ws://127.0.0.1:<n>/ws/status
    --policy <p>            Reconnect policy: fixed | exponential (default: exponential)
    --pretty                Console log lines instead of JSON
    --verbose, -v           Verbose logging
    --help, -h              Show this help
`;

function requireValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

function requireInt(argv: readonly string[], i: number, flag: string): number {
  const raw = requireValue(argv, i, flag);
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${flag} requires a positive integer, got "${raw}"`);
  }
  return value;
}

/** Parse CLI arguments (without the node and script entries). */
export function parseCliArgs(argv: readonly string[]): CliParseResult {
  let url: string | undefined;
  const config: Omit<CliConfig, "url"> = {
    inputFormat: "v4l2",
    deviceBack: "/dev/video0",
    ffmpegPath: "ffmpeg",
    policy: "exponential",
    verbose: false,
    pretty: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--url":
        url = requireValue(argv, ++i, arg);
        break;
      case "--input-format":
        config.inputFormat = requireValue(argv, ++i, arg);
        break;
      case "--device-back":
        config.deviceBack = requireValue(argv, ++i, arg);
        break;
      case "--device-front":
        config.deviceFront = requireValue(argv, ++i, arg);
        break;
      case "--audio-format":
        config.audioFormat = requireValue(argv, ++i, arg);
        break;
      case "--audio-device":
        config.audioDevice = requireValue(argv, ++i, arg);
        break;
      case "--ffmpeg":
        config.ffmpegPath = requireValue(argv, ++i, arg);
        break;
      case "--size": {
        const raw = requireValue(argv, ++i, arg);
        const match = /^(\d+)x(\d+)$/.exec(raw);
        if (!match) throw new ConfigError(`--size expects WIDTHxHEIGHT, got "${raw}"`);
        config.width = Number(match[1]);
        config.height = Number(match[2]);
        break;
      }
      case "--fps":
        config.fps = requireInt(argv, ++i, arg);
        break;
      case "--bitrate":
        config.bitrateKbps = requireInt(argv, ++i, arg);
        break;
      case "--status-port":
        config.statusPort = requireInt(argv, ++i, arg);
        break;
      case "--policy": {
        const policy = requireValue(argv, ++i, arg);
        if (policy !== "fixed" && policy !== "exponential") {
          throw new ConfigError(`--policy must be "fixed" or "exponential", got "${policy}"`);
        }
        config.policy = policy;
        break;
      }
      case "--pretty":
        config.pretty = true;
        break;
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (!url) throw new ConfigError("--url is required");
  if (config.audioDevice && !config.audioFormat) {
    throw new ConfigError("--audio-device needs --audio-format");
  }
  return { kind: "run", config: { ...config, url } };
}
