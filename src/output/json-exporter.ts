import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';
import { ViewerData } from '../engine/types';

/**
 * Export a viewer document to a JSON file.
 */
export function exportViewerToJson(viewer: ViewerData, filePath?: string): string {
  const target = filePath ?? path.join(CONFIG.OUTPUT_DIR, 'viewer-data.json');
  const outputDir = path.dirname(target);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(target, JSON.stringify(viewer, null, 2) + '\n', 'utf-8');
  return target;
}
