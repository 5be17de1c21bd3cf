/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the tool.
 * Uses dotenv for local development.
 *
 * Trimming constants (retention weeks, warning interval) are not read from
 * the environment; see ./constants.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  nodeEnv: string;
  logLevel: string;

  service: {
    name: string;
    version: string;
  };
}

interface PackageManifest {
  version?: unknown;
}

/**
 * Version from the package manifest, which sits two levels above both
 * src/config and dist/config.
 */
function readPackageVersion(): string {
  const manifestPath = path.resolve(__dirname, '..', '..', 'package.json');
  const manifest: PackageManifest = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
  return typeof manifest.version === 'string' ? manifest.version : '0.0.0';
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

  service: {
    name: process.env.SERVICE_NAME || 'countme-trim-raw',
    version: process.env.npm_package_version || readPackageVersion(),
  },
};
