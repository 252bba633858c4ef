/**
 * Image and video optimization through external tools (ImageMagick, FFmpeg)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { ExternalToolError } from "./errors.js";

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable with an argument list and reports how it exited.
 * Must not throw for a non-zero exit.
 */
export type ToolRunner = (command: string, args: string[]) => Promise<ToolResult>;

/**
 * Default runner backed by execa
 */
export const execaRunner: ToolRunner = async (command, args) => {
  const result = await execa(command, args, { reject: false });
  return {
    exitCode: typeof result.exitCode === "number" ? result.exitCode : 1,
    stdout: result.stdout,
    stderr: result.stderr || (result.failed ? `failed to run ${command}` : ""),
  };
};

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(["jpg", "jpeg", "png", "gif", "webp"]);

export interface ImageOptions {
  /** JPEG quality, 1-100 */
  quality: number;
  /** Longest allowed width; smaller images are left at their size */
  maxWidth: number;
  /** Defaults to the input's directory */
  outputDir?: string;
}

export interface VideoOptions {
  /** Target frame size, e.g. 1280x720; the picture is letterboxed to fit */
  resolution: string;
  /** Video bitrate, e.g. 2M */
  bitrate: string;
  thumbnail: boolean;
  outputDir?: string;
}

export interface OptimizeResult {
  input: string;
  output: string;
  originalBytes: number;
  optimizedBytes: number;
  savedPercent: number;
  thumbnail?: string;
}

/**
 * Lower-cased extension without the dot
 */
export function extensionOf(file: string): string {
  return path.extname(file).slice(1).toLowerCase();
}

export function isImageFile(file: string): boolean {
  return IMAGE_EXTENSIONS.has(extensionOf(file));
}

/**
 * Percentage saved, rounded down to a whole number
 */
export function savedPercent(originalBytes: number, optimizedBytes: number): number {
  if (originalBytes <= 0) {
    return 0;
  }
  return 100 - Math.floor((optimizedBytes * 100) / originalBytes);
}

export function buildImageArgs(input: string, output: string, options: ImageOptions): string[] {
  const ext = extensionOf(input);
  const args = [input, "-resize", `${options.maxWidth}x${options.maxWidth}>`];

  // Quality only applies to lossy JPEG output
  if (ext === "jpg" || ext === "jpeg") {
    args.push("-quality", String(options.quality));
  }

  args.push("-strip", output);
  return args;
}

export function buildVideoArgs(input: string, output: string, options: VideoOptions): string[] {
  const { resolution, bitrate } = options;
  const [width, height] = resolution.split("x");
  const size = `${width}:${height}`;

  return [
    "-i",
    input,
    "-vf",
    `scale=${size}:force_original_aspect_ratio=decrease,pad=${size}:(ow-iw)/2:(oh-ih)/2`,
    "-c:v",
    "libx264",
    "-preset",
    "medium",
    "-b:v",
    bitrate,
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-movflags",
    "+faststart",
    output,
    "-y",
  ];
}

export function buildThumbnailArgs(video: string, thumbnail: string): string[] {
  return ["-ss", "00:00:01", "-i", video, "-vframes", "1", "-q:v", "2", thumbnail, "-y"];
}

function outputPathFor(input: string, outputDir: string | undefined, fileName: string): string {
  return path.join(outputDir ?? path.dirname(input), fileName);
}

async function run(runner: ToolRunner, bin: string, args: string[]): Promise<void> {
  const result = await runner(bin, args);
  if (result.exitCode !== 0) {
    throw new ExternalToolError(bin, result.exitCode, result.stderr);
  }
}

async function fileSize(file: string): Promise<number> {
  const stats = await fs.stat(file);
  return stats.size;
}

/**
 * Optimize one image into `<outputDir>/optimized_<name>`
 */
export async function optimizeImage(
  input: string,
  options: ImageOptions,
  runner: ToolRunner,
  bin = "magick"
): Promise<OptimizeResult> {
  const originalBytes = await fileSize(input);
  const output = outputPathFor(input, options.outputDir, `optimized_${path.basename(input)}`);

  if (options.outputDir) {
    await fs.mkdir(options.outputDir, { recursive: true });
  }

  await run(runner, bin, buildImageArgs(input, output, options));

  const optimizedBytes = await fileSize(output);
  return {
    input,
    output,
    originalBytes,
    optimizedBytes,
    savedPercent: savedPercent(originalBytes, optimizedBytes),
  };
}

/**
 * Image files directly inside a directory, sorted by name
 */
export async function listImages(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isImageFile(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Transcode a video to H.264/AAC MP4 at `<outputDir>/<name>.mp4`,
 * optionally grabbing a frame at 1s as `<name>-thumbnail.jpg`
 */
export async function optimizeVideo(
  input: string,
  options: VideoOptions,
  runner: ToolRunner,
  bin = "ffmpeg"
): Promise<OptimizeResult> {
  const originalBytes = await fileSize(input);
  const name = path.parse(input).name;
  let output = outputPathFor(input, options.outputDir, `${name}.mp4`);
  if (path.resolve(output) === path.resolve(input)) {
    output = outputPathFor(input, options.outputDir, `${name}-optimized.mp4`);
  }

  if (options.outputDir) {
    await fs.mkdir(options.outputDir, { recursive: true });
  }

  await run(runner, bin, buildVideoArgs(input, output, options));

  const optimizedBytes = await fileSize(output);
  const result: OptimizeResult = {
    input,
    output,
    originalBytes,
    optimizedBytes,
    savedPercent: savedPercent(originalBytes, optimizedBytes),
  };

  if (options.thumbnail) {
    const thumbnail = outputPathFor(input, options.outputDir, `${name}-thumbnail.jpg`);
    await run(runner, bin, buildThumbnailArgs(output, thumbnail));
    result.thumbnail = thumbnail;
  }

  return result;
}
