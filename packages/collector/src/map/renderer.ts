// ============================================================================
// RF Mapper: Heatmap Renderer
// Standalone Leaflet + leaflet.heat page built from templates/heatmap.html
// ============================================================================
import { spawn } from 'child_process';
import { readFileSync } from 'fs';
import type { PositionedRecord } from '@rfmapper/shared';
import type { SpawnFn } from '../announce/speaker.js';
import { MapperError } from '../errors.js';

export type HeatPoint = [latitude: number, longitude: number, intensity: number];

export interface HeatmapData {
  center: [number, number];
  zoom: number;
  radius: number;
  points: HeatPoint[];
  count: number;
  min: number;
  max: number;
}

export interface HeatmapOptions {
  zoom: number;
  radius: number;
}

const TEMPLATE_URL = new URL('../../templates/heatmap.html', import.meta.url);

export function loadTemplate(): string {
  return readFileSync(TEMPLATE_URL, 'utf-8');
}

/** Smallest and largest level in one pass; runs of any length */
export function levelRange(levels: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const level of levels) {
    if (level < min) min = level;
    if (level > max) max = level;
  }
  return { min, max };
}

/** Scale levels onto [0, 1]; a flat set maps to 1 everywhere */
export function normaliseIntensities(levels: readonly number[]): number[] {
  if (levels.length === 0) return [];
  const { min, max } = levelRange(levels);
  const span = max - min;
  return levels.map((level) => (span > 0 ? (level - min) / span : 1));
}

export function buildHeatmapData(records: readonly PositionedRecord[], options: HeatmapOptions): HeatmapData {
  if (records.length === 0) {
    throw new MapperError('No positioned records to map; was a GPS attached during collection?');
  }
  const levels = records.map((r) => r.level);
  const intensities = normaliseIntensities(levels);
  const { min, max } = levelRange(levels);
  return {
    center: [records[0].latitude, records[0].longitude],
    zoom: options.zoom,
    radius: options.radius,
    points: records.map((r, i) => [r.latitude, r.longitude, intensities[i]]),
    count: records.length,
    min,
    max,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Fill the template; the data is embedded as a script literal */
export function renderHeatmap(template: string, data: HeatmapData, title: string): string {
  const json = JSON.stringify(data).replace(/</g, '\\u003c');
  return template
    .split('{{TITLE}}').join(escapeHtml(title))
    .split('{{DATA}}').join(json);
}

const OPENERS: Partial<Record<NodeJS.Platform, (path: string) => [string, string[]]>> = {
  darwin: (path) => ['open', [path]],
  win32: (path) => ['cmd', ['/c', 'start', '""', path]],
};

/** Hand the file to the desktop's default viewer without waiting for it */
export function openInBrowser(path: string, platform: NodeJS.Platform = process.platform, spawnFn: SpawnFn = spawn) {
  const [command, args] = (OPENERS[platform] ?? ((p: string): [string, string[]] => ['xdg-open', [p]]))(path);
  const child = spawnFn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (err) => {
    console.warn(`🗺️ Could not open ${path} with ${command}: ${err.message}`);
  });
  child.unref();
}
