#!/usr/bin/env node
// resume-regions CLI: scan / export / overlay / hit against one PDF.

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';

import { RegionSession, NO_REGIONS_NOTICE, type BackendFactory } from './src/region-session.js';
import { summarizeRegions } from './src/pdf/regions.js';
import { isSettingsInput, validateSettings } from './src/services/settings-validator.js';
import { describeError } from './src/errors.js';
import type { RegionSettings } from './src/types.js';
import type { FitMode } from './src/pdf/types.js';

const USAGE = `Usage: resume-regions <command> <pdf> [options]

Commands:
  scan                     List resolved regions
  export [--out file]      Write <pdf>.regions.json (or --out)
  overlay [--page n] [--zoom z] [--out file]
                           Write a debug PNG with region boxes
  hit --page n --x px --y py [--fit mode] [--width w] [--height h]
                           Print the region under a display point

Options:
  --config file            JSON settings file
  -h, --help               Show this help`;

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
  openBackend?: BackendFactory;
};

const FIT_MODES: readonly FitMode[] = ['natural', 'fit_width', 'fit_height'];

function parseFitMode(raw: string | undefined, fallback: FitMode): FitMode {
  if (raw === undefined) return fallback;
  const mode = FIT_MODES.find((m) => m === raw);
  if (!mode) throw new Error(`Unknown fit mode "${raw}" (expected ${FIT_MODES.join(', ')})`);
  return mode;
}

function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${name} must be a number, got "${raw}"`);
  return n;
}

function parsePageOption(raw: string | undefined): number | undefined {
  const n = parseNumberOption('page', raw);
  if (n === undefined) return undefined;
  if (!Number.isInteger(n) || n < 1) throw new Error(`--page must be a positive integer, got "${raw}"`);
  return n - 1;
}

async function loadSettings(configPath: string | undefined): Promise<RegionSettings> {
  if (!configPath) return validateSettings(null);
  const raw: unknown = JSON.parse(await readFile(configPath, 'utf8'));
  if (!isSettingsInput(raw)) throw new Error(`Config file ${configPath} must contain a JSON object`);
  return validateSettings(raw);
}

export async function runCli(argv: string[], out: CliIo = { log: console.log, error: console.error }): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      out: { type: 'string' },
      page: { type: 'string' },
      zoom: { type: 'string' },
      x: { type: 'string' },
      y: { type: 'string' },
      fit: { type: 'string' },
      width: { type: 'string' },
      height: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, pdfArg] = positionals;
  if (values.help || !command) {
    out.log(USAGE);
    return command || values.help ? 0 : 1;
  }
  if (!['scan', 'export', 'overlay', 'hit'].includes(command)) {
    out.error(`Unknown command "${command}"\n\n${USAGE}`);
    return 1;
  }
  if (!pdfArg) {
    out.error(`Missing <pdf> argument\n\n${USAGE}`);
    return 1;
  }

  const settings = await loadSettings(values.config);
  const pdfPath = path.resolve(pdfArg);
  const session = new RegionSession({ settings, openBackend: out.openBackend });

  try {
    const regions = await session.open(pdfPath);

    switch (command) {
      case 'scan': {
        out.log(`Found ${regions.size} regions across ${session.pageCount} pages.`);
        for (const line of summarizeRegions(regions)) out.log(line);
        if (!regions.size) out.log(NO_REGIONS_NOTICE);
        return 0;
      }
      case 'export': {
        const written = await session.exportRegions(values.out ? path.resolve(values.out) : undefined);
        out.log(`Wrote ${written}`);
        return 0;
      }
      case 'overlay': {
        const pageIndex = parsePageOption(values.page) ?? 0;
        const zoom = parseNumberOption('zoom', values.zoom) ?? settings.debugZoom;
        const written = await session.exportDebugPng(pageIndex, zoom, values.out ? path.resolve(values.out) : undefined);
        out.log(`Wrote ${written}`);
        return 0;
      }
      default: {
        const x = parseNumberOption('x', values.x);
        const y = parseNumberOption('y', values.y);
        if (x === undefined || y === undefined) {
          out.error('hit needs --x and --y');
          return 1;
        }
        session.goToPage(parsePageOption(values.page) ?? 0);
        session.setFitMode(parseFitMode(values.fit, settings.fitMode));
        session.resize({
          width: parseNumberOption('width', values.width) ?? 0,
          height: parseNumberOption('height', values.height) ?? 0,
        });
        const hit = await session.click({ x, y });
        if (!hit) {
          out.log('No region at that point.');
          return 0;
        }
        out.log(`=== ${hit.id} ===`);
        out.log(hit.text);
        return 0;
      }
    }
  } finally {
    await session.close();
  }
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`[ResumeRegions] ${describeError(err)}`);
      process.exitCode = 1;
    }
  );
}
