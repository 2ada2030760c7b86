#!/usr/bin/env node
/**
 * Render Deploy Config
 *
 * Writes the nginx virtual host and the systemd unit for this checkout
 * into deploy/. Settings come from the environment (see DeployEnvSchema).
 *
 * Usage:
 *   npm run build && DEPLOY_DIR=/opt/bot npm run render:deploy
 *   sudo cp deploy/bot.service /etc/systemd/system/
 *   sudo cp deploy/bot.nginx.conf /etc/nginx/sites-available/bot
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { deployOptionsFromEnv } from '../src/deploy/deploy-options';
import { renderNginxVhost } from '../src/deploy/nginx-vhost';
import { renderSystemdUnit } from '../src/deploy/systemd-unit';

async function renderDeployConfig() {
  const options = deployOptionsFromEnv(process.env);
  const outDir = path.join(process.cwd(), 'deploy');
  await mkdir(outDir, { recursive: true });

  const files: Array<[string, string]> = [
    ['bot.nginx.conf', renderNginxVhost(options.nginx)],
    ['bot.service', renderSystemdUnit(options.systemd)],
  ];
  for (const [name, contents] of files) {
    await writeFile(path.join(outDir, name), contents);
    console.log(`Wrote ${path.join('deploy', name)}`);
  }
}

renderDeployConfig().catch((error: unknown) => {
  console.error('Rendering deploy config failed:', error);
  process.exit(1);
});
