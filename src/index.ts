#!/usr/bin/env node

import { createRequire } from "node:module";
import fs from "node:fs/promises";
import { ImageAPI } from "./api.js";
import { isChromaSubsample } from "./options.js";
import { isSupportedImage } from "./format.js";
import { formatBytes, formatDuration } from "./utils.js";
import type { CompressionOptions, CompressionResult } from "./types.js";

interface ParsedArgs {
  inputs: string[];
  options: Partial<CompressionOptions>;
  recursive: boolean;
  help: boolean;
  version: boolean;
}

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
imgshrink v${VERSION} - Shrink JPEG and PNG images

Usage:
  imgshrink <file...>                  Compress file(s), output next to source
  imgshrink <dir>                      Compress all images in dir
  imgshrink -o <outputDir> <input...>  Write results to a separate directory
  imgshrink -q 70 -p 50 <file>         Quality 70, half the dimensions

Options:
  -q, --quality <n>     JPEG quality 1-100 (default: 85)
  -l, --level <n>       PNG compression level 0-9 (default: 6)
  -p, --percent <n>     Resize by percent, 0 disables (default: 0)
  -W, --width <n>       Target width in pixels, 0 keeps aspect (default: 0)
  -H, --height <n>      Target height in pixels, 0 keeps aspect (default: 0)
  -o, --output <dir>    Output directory (default: next to source)
  -s, --suffix <text>   Suffix added before the extension (default: _compressed)
      --chroma <mode>   JPEG chroma subsampling: 4:4:4, 4:2:2, 4:2:0 (default: 4:2:0)
      --baseline        Baseline instead of progressive JPEG
      --interlace       Adam7-interlaced PNG
      --keep-metadata   Keep EXIF, ICC and XMP metadata
  -r, --recursive       Process subdirectories recursively
  -h, --help            Show this help message
  -v, --version         Show version number

Supported formats: jpg, jpeg, png
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function numberArg(flag: string, value: string | undefined, parse: (raw: string) => number): number {
  if (value === undefined) {
    fail(`${flag} requires a numeric argument`);
  }
  const parsed = parse(value);
  if (Number.isNaN(parsed)) {
    fail(`invalid ${flag.replace(/^-+/, "")} value: ${value}`);
  }
  return parsed;
}

const toInt = (raw: string): number => parseInt(raw, 10);

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const options: Partial<CompressionOptions> = {};
  const result: ParsedArgs = {
    inputs: [],
    options,
    recursive: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "-h":
      case "--help":
        result.help = true;
        return result;
      case "-v":
      case "--version":
        result.version = true;
        return result;
      case "-r":
      case "--recursive":
        result.recursive = true;
        break;
      case "-q":
      case "--quality":
        // Clamped to 1-100 by normalizeOptions
        options.quality = numberArg("--quality", args[++i], toInt);
        break;
      case "-l":
      case "--level":
        options.compressionLevel = numberArg("--level", args[++i], toInt);
        break;
      case "-p":
      case "--percent":
        options.resizePercent = numberArg("--percent", args[++i], parseFloat);
        break;
      case "-W":
      case "--width":
        options.resizeWidth = numberArg("--width", args[++i], toInt);
        break;
      case "-H":
      case "--height":
        options.resizeHeight = numberArg("--height", args[++i], toInt);
        break;
      case "-o":
      case "--output": {
        const next = args[++i];
        if (next === undefined) fail("--output requires a directory argument");
        options.outputDir = next;
        break;
      }
      case "-s":
      case "--suffix": {
        const next = args[++i];
        if (next === undefined) fail("--suffix requires an argument");
        options.outputSuffix = next;
        break;
      }
      case "--chroma": {
        const next = args[++i];
        if (next === undefined || !isChromaSubsample(next)) {
          fail(`invalid chroma subsampling: ${next ?? "(missing)"}`);
        }
        options.chromaSubsample = next;
        break;
      }
      case "--baseline":
        options.progressive = false;
        break;
      case "--interlace":
        options.interlaced = true;
        break;
      case "--keep-metadata":
        options.stripMetadata = false;
        break;
      default:
        if (arg.startsWith("-")) {
          console.error(`Error: unknown option: ${arg}`);
          console.error("Run imgshrink --help for usage");
          process.exit(1);
        }
        result.inputs.push(arg);
    }
  }

  return result;
}

async function collectFiles(api: ImageAPI, inputs: string[], recursive: boolean): Promise<string[]> {
  const files: string[] = [];
  for (const input of inputs) {
    const stat = await fs.stat(input);

    if (stat.isDirectory()) {
      files.push(...(await api.scanDirectory(input, recursive)));
    } else if (stat.isFile()) {
      if (isSupportedImage(input)) {
        files.push(input);
      } else {
        console.warn(`Skipping: not a supported image file: ${input}`);
      }
    } else {
      throw new Error(`Input is neither a file nor a directory: ${input}`);
    }
  }
  return files;
}

function printResult(result: CompressionResult): void {
  if (!result.success) {
    console.log(`✗ ${result.inputPath}: ${result.error.message}`);
    return;
  }
  console.log(`✓ ${result.inputPath}`);
  console.log(
    `  ${formatBytes(result.inputSize)} → ${formatBytes(result.outputSize)} (${result.reduction.toFixed(1)}% reduction)`,
  );
  console.log(`  Output: ${result.outputPath}`);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.inputs.length === 0) {
    console.error("Error: no input file or directory specified");
    console.error("Run imgshrink --help for usage");
    process.exit(1);
  }

  const api = new ImageAPI();
  const files = await collectFiles(api, parsed.inputs, parsed.recursive);
  if (files.length === 0) {
    throw new Error("No supported image files found");
  }

  console.log(`Compressing ${files.length} file(s)...\n`);
  const batch = await api.batchCompress(files, parsed.options, printResult);

  console.log("\nCompression completed:");
  console.log(`  Total files: ${batch.results.length}`);
  console.log(`  Succeeded:   ${batch.successCount}`);
  console.log(`  Failed:      ${batch.failCount}`);
  console.log(`  Duration:    ${formatDuration(batch.durationMs)}`);
  if (batch.successCount > 0) {
    console.log(`  Total:       ${formatBytes(batch.totalInput)} → ${formatBytes(batch.totalOutput)}`);
    console.log(`  Saved:       ${formatBytes(batch.totalInput - batch.totalOutput)}`);
    console.log(`  Reduction:   ${batch.totalReduction.toFixed(1)}%`);
  }

  if (batch.failCount > 0) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
