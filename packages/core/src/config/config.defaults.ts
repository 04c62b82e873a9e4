import type { AuditrayConfig } from '@auditray/shared'

export const DEFAULT_CONFIG: AuditrayConfig = {
  icon_theme: 'default',
  watcher: {
    path: '/var/lib/pacman/local',
  },
  checker: {
    command: 'arch-audit',
    args: ['--json', '--upgradable'],
    advisory_base_url: 'https://security.archlinux.org/',
  },
  server: {
    port: 7433,
  },
  log: {
    level: 'info',
  },
}
