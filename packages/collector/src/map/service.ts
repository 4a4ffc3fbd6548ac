import { writeFileSync } from 'fs';
import { basename } from 'path';
import { csvPath, isPositioned, mapPath } from '@rfmapper/shared';
import type { MapperConfig } from '@rfmapper/shared';
import { dedupe } from '../output/dedupe.js';
import { readRecords } from '../output/csv.js';
import { buildHeatmapData, loadTemplate, openInBrowser, renderHeatmap } from './renderer.js';

export type MapSettings = Pick<MapperConfig,
  'outputBase' | 'deduplicate' | 'dedupeStep' | 'autoOpenMap' | 'mapZoom' | 'mapRadius'>;

export interface MapDeps {
  template?: string;
  open?: (path: string) => void;
}

/**
 * The generate-map command: read the collected CSV, drop rows without a
 * position, optionally thin them onto a grid and write the heatmap page.
 * Returns the path of the page.
 */
export function generateMap(config: MapSettings, deps: MapDeps = {}): string {
  const source = csvPath(config);
  const records = readRecords(source);
  const positioned = records.filter(isPositioned);
  console.log(`🗺️ ${records.length} record(s) in ${source}, ${positioned.length} with a position`);

  const points = config.deduplicate ? dedupe(positioned, config.dedupeStep) : positioned;
  if (config.deduplicate) {
    console.log(`🗺️ ${points.length} cell(s) after binning to ${config.dedupeStep}°`);
  }

  const data = buildHeatmapData(points, { zoom: config.mapZoom, radius: config.mapRadius });
  const target = mapPath(config);
  const html = renderHeatmap(deps.template ?? loadTemplate(), data, `RF map: ${basename(config.outputBase)}`);
  writeFileSync(target, html);
  console.log(`🗺️ Map written to ${target}`);

  if (config.autoOpenMap) (deps.open ?? openInBrowser)(target);
  return target;
}
