/**
 * YAML file helpers shared by the state files and the config loader.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';

/** Parse a YAML file; a missing or empty file yields undefined */
export function readYamlFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseYaml(content, filePath);
}

export function parseYaml(content: string, filePath?: string): unknown {
  const parsed: unknown = yaml.load(content, { filename: filePath });
  return parsed ?? undefined;
}

export function writeYamlFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, yaml.dump(data, { lineWidth: -1 }), 'utf-8');
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, { lineWidth: -1 });
}
