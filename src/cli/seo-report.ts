#!/usr/bin/env node
import { config } from "dotenv";
import fs from "fs";
import path from "path";
import { generate } from "../generationEngine";
import { isVideoContext, validateVideoContext } from "../validator";
import type { BackendKind } from "../types";

config();

const USAGE = "Usage: seo-report <video-context.json> [--local] [--model <id>] [--language <name>]";

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (!value || value.startsWith("--")) fail(`${flag} needs a value\n${USAGE}`);
  return value;
}

async function main(args: string[]) {
  let file: string | undefined;
  let backend: BackendKind = "remote";
  let model: string | undefined;
  let language: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--local") backend = "local";
    else if (arg === "--model") model = takeValue(args, i++, arg);
    else if (arg === "--language") language = takeValue(args, i++, arg);
    else if (arg.startsWith("--")) fail(`unknown option ${arg}\n${USAGE}`);
    else file = arg;
  }
  if (!file) fail(USAGE);

  let video: unknown;
  try {
    video = JSON.parse(fs.readFileSync(path.resolve(file), "utf8"));
  } catch (err) {
    fail(`cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isVideoContext(video)) {
    fail(`${file} is not a video context:\n${(validateVideoContext(video).errors ?? []).join("\n")}`);
  }

  const result = await generate(video, { backend, model, language });
  console.log(JSON.stringify(result, null, 2));
}

main(process.argv.slice(2)).catch((err: unknown) => fail(err instanceof Error ? err.stack ?? err.message : String(err)));
