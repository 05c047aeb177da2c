import os from 'os'
import { utils } from 'faultline-core'

/**
 * The `device` section of a report. The hostname prefers COMPUTERNAME (Windows) and HOSTNAME (*nix).
 */
export function getDeviceMetadata(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const { locale, timeZone } = Intl.DateTimeFormat().resolvedOptions()

  return {
    hostname: env.COMPUTERNAME || env.HOSTNAME || os.hostname(),
    locale,
    timezone: timeZone,
    osName: os.type(),
    osVersion: os.release(),
    totalMemory: os.totalmem(),
    freeMemory: os.freemem(),
    time: utils.currentISOTime(),
  }
}

export function getAppMetadata(): Record<string, unknown> {
  return {
    type: 'node',
    runtimeVersion: process.versions.node,
    platform: process.platform,
    arch: process.arch,
  }
}
