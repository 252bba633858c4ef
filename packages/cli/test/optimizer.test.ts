/**
 * Unit tests for the media optimizers
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { access } from "node:fs/promises";
import { createFakeTool, createTempDir, removeDir, writeSizedFile } from "@recordkit/testkit";
import {
  buildImageArgs,
  buildThumbnailArgs,
  buildVideoArgs,
  isImageFile,
  listImages,
  optimizeImage,
  optimizeVideo,
  savedPercent,
} from "../src/lib/optimizer.js";
import { ExternalToolError } from "../src/lib/errors.js";

describe("optimizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("argument building", () => {
    it("should add quality for JPEG input only", () => {
      const options = { quality: 80, maxWidth: 1280 };
      expect(buildImageArgs("a/photo.JPG", "out/photo.JPG", options)).toEqual([
        "a/photo.JPG",
        "-resize",
        "1280x1280>",
        "-quality",
        "80",
        "-strip",
        "out/photo.JPG",
      ]);
      expect(buildImageArgs("logo.png", "o.png", options)).toEqual([
        "logo.png",
        "-resize",
        "1280x1280>",
        "-strip",
        "o.png",
      ]);
    });

    it("should scale and pad video to the target frame", () => {
      const args = buildVideoArgs("in.mov", "in.mp4", {
        resolution: "1280x720",
        bitrate: "2M",
        thumbnail: false,
      });
      expect(args.slice(0, 4)).toEqual([
        "-i",
        "in.mov",
        "-vf",
        "scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2",
      ]);
      expect(args.slice(4)).toEqual([
        "-c:v",
        "libx264",
        "-preset",
        "medium",
        "-b:v",
        "2M",
        "-c:a",
        "aac",
        "-b:a",
        "128k",
        "-movflags",
        "+faststart",
        "in.mp4",
        "-y",
      ]);
    });

    it("should grab the thumbnail frame at one second", () => {
      expect(buildThumbnailArgs("v.mp4", "v-thumbnail.jpg")).toEqual([
        "-ss",
        "00:00:01",
        "-i",
        "v.mp4",
        "-vframes",
        "1",
        "-q:v",
        "2",
        "v-thumbnail.jpg",
        "-y",
      ]);
    });
  });

  describe("savedPercent", () => {
    it("should round the saving down", () => {
      expect(savedPercent(1000, 333)).toBe(67);
      expect(savedPercent(100, 100)).toBe(0);
      expect(savedPercent(0, 10)).toBe(0);
    });
  });

  describe("file selection", () => {
    it("should recognise image extensions case-insensitively", () => {
      expect(isImageFile("a.WEBP")).toBe(true);
      expect(isImageFile("notes.txt")).toBe(false);
    });

    it("should list images directly inside a directory", async () => {
      await writeSizedFile(dir, "b.png", 1);
      await writeSizedFile(dir, "a.jpg", 1);
      await writeSizedFile(dir, "readme.md", 1);

      expect(await listImages(dir)).toEqual([path.join(dir, "a.jpg"), path.join(dir, "b.png")]);
    });
  });

  describe("optimizeImage", () => {
    it("should run the tool and report sizes", async () => {
      const input = await writeSizedFile(dir, "photo.jpg", 200);
      const tool = createFakeTool({ outputBytes: 50 });

      const result = await optimizeImage(input, { quality: 85, maxWidth: 1920 }, tool.run, "magick");

      expect(tool.calls).toHaveLength(1);
      expect(tool.calls[0].command).toBe("magick");
      expect(result).toEqual({
        input,
        output: path.join(dir, "optimized_photo.jpg"),
        originalBytes: 200,
        optimizedBytes: 50,
        savedPercent: 75,
      });
    });

    it("should create the output directory", async () => {
      const input = await writeSizedFile(dir, "photo.png", 10);
      const outputDir = path.join(dir, "out", "nested");
      const tool = createFakeTool();

      const result = await optimizeImage(input, { quality: 85, maxWidth: 1920, outputDir }, tool.run);

      expect(result.output).toBe(path.join(outputDir, "optimized_photo.png"));
      await expect(access(result.output)).resolves.toBeUndefined();
    });

    it("should fail with the tool's stderr on a non-zero exit", async () => {
      const input = await writeSizedFile(dir, "photo.jpg", 10);
      const tool = createFakeTool({ exitCode: 1, stderr: "magick: improper image header" });

      const promise = optimizeImage(input, { quality: 85, maxWidth: 1920 }, tool.run, "magick");
      await expect(promise).rejects.toBeInstanceOf(ExternalToolError);
      await expect(promise).rejects.toThrow("magick exited with code 1: magick: improper image header");
    });
  });

  describe("optimizeVideo", () => {
    const options = { resolution: "1280x720", bitrate: "2M", thumbnail: false };

    it("should write an MP4 next to the input", async () => {
      const input = await writeSizedFile(dir, "clip.mov", 400);
      const tool = createFakeTool({ outputBytes: 100 });

      const result = await optimizeVideo(input, options, tool.run, "ffmpeg");

      expect(result).toEqual({
        input,
        output: path.join(dir, "clip.mp4"),
        originalBytes: 400,
        optimizedBytes: 100,
        savedPercent: 75,
      });
    });

    it("should not overwrite an MP4 input", async () => {
      const input = await writeSizedFile(dir, "clip.mp4", 400);
      const tool = createFakeTool();

      const result = await optimizeVideo(input, options, tool.run);

      expect(result.output).toBe(path.join(dir, "clip-optimized.mp4"));
    });

    it("should grab a thumbnail when asked", async () => {
      const input = await writeSizedFile(dir, "clip.mov", 400);
      const tool = createFakeTool();

      const result = await optimizeVideo(input, { ...options, thumbnail: true }, tool.run);

      const thumbnail = path.join(dir, "clip-thumbnail.jpg");
      expect(result.thumbnail).toBe(thumbnail);
      expect(tool.calls).toHaveLength(2);
      expect(tool.calls[1].args).toEqual(buildThumbnailArgs(path.join(dir, "clip.mp4"), thumbnail));
    });

    it("should stop before stat'ing output when the tool fails", async () => {
      const input = await writeSizedFile(dir, "clip.mov", 400);
      const tool = createFakeTool({ exitCode: 1, stderr: "Unknown encoder 'libx264'" });

      await expect(optimizeVideo(input, { ...options, thumbnail: true }, tool.run)).rejects.toMatchObject({
        exitCode: 3,
        toolExitCode: 1,
      });
      expect(tool.calls).toHaveLength(1);
    });
  });
});
