import { z } from 'zod';
import type { NginxVhostOptions } from './nginx-vhost';
import type { SystemdUnitOptions } from './systemd-unit';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const withDefault = (value: string) =>
  z.preprocess(blankToUndefined, z.string().min(1).default(value));

/** Deployment settings, read from the environment of render-deploy-config */
export const DeployEnvSchema = z.object({
  DEPLOY_SERVER_NAME: withDefault('bot.swissrpg.ch'),
  HOST: withDefault('127.0.0.1'),
  PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(65535).default(3000),
  ),
  DEPLOY_DIR: withDefault('/opt/bot'),
  DEPLOY_USER: withDefault('bot'),
  DEPLOY_NODE_PATH: withDefault('/usr/bin/node'),
  DEPLOY_CERTIFICATE_DIR: z.preprocess(blankToUndefined, z.string().min(1).optional()),
});

export type DeployEnv = z.infer<typeof DeployEnvSchema>;

/** Stylesheets and images of the linking pages, relative to the repo root */
export const STATIC_ASSETS_DIR = 'api/src/html/static';

/**
 * Absolute static asset directory for a checkout at `root`. The process runs
 * from the repo root, both through `npm start` and under systemd.
 */
export function staticAssetsDir(root: string): string {
  return `${root.replace(/\/+$/, '')}/${STATIC_ASSETS_DIR}`;
}

export interface DeployOptions {
  nginx: NginxVhostOptions;
  systemd: SystemdUnitOptions;
}

export function deployOptionsFromEnv(
  env: Record<string, string | undefined>,
): DeployOptions {
  const parsed: DeployEnv = DeployEnvSchema.parse(env);
  const serverName = parsed.DEPLOY_SERVER_NAME;
  const root = parsed.DEPLOY_DIR.replace(/\/+$/, '');
  return {
    nginx: {
      serverName,
      upstreamHost: parsed.HOST,
      upstreamPort: parsed.PORT,
      staticRoot: staticAssetsDir(root),
      certificateDir:
        parsed.DEPLOY_CERTIFICATE_DIR ?? `/etc/letsencrypt/live/${serverName}`,
    },
    systemd: {
      description: `Discord bot (${serverName})`,
      user: parsed.DEPLOY_USER,
      workingDirectory: root,
      environmentFile: `${root}/.env`,
      nodePath: parsed.DEPLOY_NODE_PATH,
    },
  };
}
