import os from 'node:os'

/** First non-internal IPv4 address, or loopback when there is none. */
export function getLocalIp(interfaces: ReturnType<typeof os.networkInterfaces> = os.networkInterfaces()): string {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) return address.address
    }
  }
  return '127.0.0.1'
}

/** Address other devices on the LAN open to reach this server. */
export function remoteUrl(port: number, interfaces?: ReturnType<typeof os.networkInterfaces>): string {
  return `http://${getLocalIp(interfaces)}:${port}`
}
