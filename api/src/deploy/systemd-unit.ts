export interface SystemdUnitOptions {
  description: string;
  /** Account the bot runs as */
  user: string;
  /** Checkout the bot runs from; holds dist/ */
  workingDirectory: string;
  environmentFile: string;
  nodePath: string;
}

/**
 * `bot.service`. The bot runs in the foreground and logs to stdout and
 * stderr, which systemd hands to the journal.
 */
export function renderSystemdUnit(options: SystemdUnitOptions): string {
  return [
    '[Unit]',
    `Description=${options.description}`,
    'Wants=network-online.target',
    'After=network-online.target redis-server.service',
    '',
    '[Service]',
    'Type=simple',
    `User=${options.user}`,
    `WorkingDirectory=${options.workingDirectory}`,
    `EnvironmentFile=${options.environmentFile}`,
    `ExecStart=${options.nodePath} dist/api/src/main.js`,
    'Restart=on-failure',
    'RestartSec=5',
    'StandardOutput=journal',
    'StandardError=journal',
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ].join('\n');
}
