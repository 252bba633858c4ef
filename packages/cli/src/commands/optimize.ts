/**
 * Media optimization commands for CLI
 */

import * as path from "node:path";
import { Command } from "commander";
import { parseBitrate, parseIntInRange, parseResolution } from "../lib/arg.js";
import { resolveToolBin } from "../lib/env.js";
import { CliError, ExternalToolError } from "../lib/errors.js";
import { statInput } from "../lib/io.js";
import {
  isImageFile,
  listImages,
  optimizeImage,
  optimizeVideo,
  type OptimizeResult,
} from "../lib/optimizer.js";
import { colorize, formatBytes, printJson, printLines } from "../lib/render.js";
import { emitMetric, withTiming } from "../lib/telemetry.js";
import type { CliDeps, GlobalOptions } from "../lib/context.js";

interface ImageCommandOptions {
  quality: number;
  maxWidth: number;
  outputDir?: string;
}

interface VideoCommandOptions {
  resolution: string;
  bitrate: string;
  thumbnail?: boolean;
  outputDir?: string;
}

/**
 * One summary line per optimized file
 */
export function formatResult(result: OptimizeResult): string {
  const { input, output, originalBytes, optimizedBytes, savedPercent } = result;
  return `✓ ${path.basename(input)} -> ${output} (${formatBytes(originalBytes)} -> ${formatBytes(
    optimizedBytes
  )}, ${savedPercent}% saved)`;
}

function report(results: OptimizeResult[], opts: GlobalOptions): void {
  for (const result of results) {
    emitMetric("cli.optimize.file", {
      input: result.input,
      original_bytes: result.originalBytes,
      optimized_bytes: result.optimizedBytes,
    });
  }

  if (opts.quiet) {
    return;
  }

  if (opts.raw) {
    printJson(results, { raw: true });
    return;
  }

  const lines: string[] = [];
  for (const result of results) {
    lines.push(formatResult(result));
    if (result.thumbnail) {
      lines.push(`  thumbnail: ${result.thumbnail}`);
    }
  }
  printLines(lines);
}

function warn(message: string): void {
  console.error(colorize(message, "yellow", process.stderr));
}

/**
 * Register optimize-image and optimize-video on the program
 */
export function createOptimizeCommands(program: Command, deps: CliDeps): void {
  program
    .command("optimize-image <input>")
    .description("Resize and strip images with ImageMagick (file or directory)")
    .option(
      "-q, --quality <n>",
      "JPEG quality, 1-100",
      (value) => parseIntInRange(value, "--quality", 1, 100),
      85
    )
    .option(
      "-w, --max-width <px>",
      "Shrink images wider than this",
      (value) => parseIntInRange(value, "--max-width", 1, 100000),
      1920
    )
    .option("-o, --output-dir <dir>", "Write optimized files here (default: next to the input)")
    .addHelpText(
      "after",
      `
Examples:
  $ recordkit optimize-image photo.jpg -q 80
  $ recordkit optimize-image ./images -w 1280 -o ./optimized`
    )
    .action(async (input: string, options: ImageCommandOptions) => {
      await withTiming("cli.optimize-image", async () => {
        const stats = await statInput(input);
        const directory = stats.isDirectory();

        let files: string[];
        if (directory) {
          files = await listImages(input);
          if (files.length === 0) {
            warn(`No images found in ${input}`);
            return;
          }
        } else if (isImageFile(input)) {
          files = [input];
        } else {
          warn(`Skipping non-image file: ${path.basename(input)}`);
          return;
        }

        const bin = resolveToolBin("magick");
        const results: OptimizeResult[] = [];
        let failed = 0;
        for (const file of files) {
          try {
            results.push(await optimizeImage(file, options, deps.runTool, bin));
          } catch (err) {
            // In a directory run a failed image is reported and the rest carry on
            if (!directory || !(err instanceof ExternalToolError)) {
              throw err;
            }
            failed++;
            warn(`Failed to process ${path.basename(file)}: ${err.message}`);
          }
        }

        report(results, program.opts<GlobalOptions>());

        if (failed > 0) {
          throw new CliError(`${failed} of ${files.length} images failed to optimize`, {
            exitCode: 3,
          });
        }
      });
    });

  program
    .command("optimize-video <input>")
    .description("Transcode a video to web-friendly H.264/AAC MP4 with FFmpeg")
    .option(
      "-r, --resolution <WxH>",
      "Frame size; the picture is scaled down and padded to fit",
      (value) => parseResolution(value, "--resolution"),
      "1280x720"
    )
    .option(
      "-b, --bitrate <rate>",
      "Video bitrate",
      (value) => parseBitrate(value, "--bitrate"),
      "2M"
    )
    .option("-t, --thumbnail", "Also write a JPEG thumbnail from the frame at 1s")
    .option("-o, --output-dir <dir>", "Write output here (default: next to the input)")
    .action(async (input: string, options: VideoCommandOptions) => {
      await withTiming("cli.optimize-video", async () => {
        await statInput(input);

        const result = await optimizeVideo(
          input,
          {
            resolution: options.resolution,
            bitrate: options.bitrate,
            thumbnail: options.thumbnail ?? false,
            outputDir: options.outputDir,
          },
          deps.runTool,
          resolveToolBin("ffmpeg")
        );

        report([result], program.opts<GlobalOptions>());
      });
    });
}
