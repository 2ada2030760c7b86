export interface NginxVhostOptions {
  /** Public hostname, e.g. bot.swissrpg.ch */
  serverName: string;
  upstreamHost: string;
  upstreamPort: number;
  /** Directory served under /static/ */
  staticRoot: string;
  /** Directory holding fullchain.pem and privkey.pem, as certbot lays it out */
  certificateDir: string;
}

const withTrailingSlash = (dir: string) => (dir.endsWith('/') ? dir : `${dir}/`);

/**
 * nginx configuration for the bot's front door. TLS ends at nginx; the
 * bot itself only speaks plain HTTP on the loopback interface.
 */
export function renderNginxVhost(options: NginxVhostOptions): string {
  const { serverName, upstreamHost, upstreamPort } = options;
  const certificateDir = withTrailingSlash(options.certificateDir);

  return [
    'server {',
    '    listen 80 default_server;',
    '    listen [::]:80 default_server;',
    '    server_name _;',
    '    return 404;',
    '}',
    '',
    'server {',
    '    listen 80;',
    '    listen [::]:80;',
    `    server_name ${serverName};`,
    `    return 301 https://${serverName}$request_uri;`,
    '}',
    '',
    'server {',
    '    listen 443 ssl;',
    '    listen [::]:443 ssl;',
    `    server_name ${serverName};`,
    '',
    `    ssl_certificate ${certificateDir}fullchain.pem;`,
    `    ssl_certificate_key ${certificateDir}privkey.pem;`,
    '',
    '    location /static/ {',
    `        alias ${withTrailingSlash(options.staticRoot)};`,
    '    }',
    '',
    '    location / {',
    `        proxy_pass http://${upstreamHost}:${upstreamPort};`,
    '        proxy_set_header Host $host;',
    '        proxy_set_header X-Real-IP $remote_addr;',
    '    }',
    '}',
    '',
  ].join('\n');
}
