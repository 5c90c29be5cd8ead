import * as fs from 'fs/promises';

const IP_PATTERN = /(?:\d{1,3}\.){3}\d{1,3}/;

/**
 * First IPv4-looking token in `line`, or null. Octets are not range-checked.
 */
export function extractIpAddress(line: string): string | null {
  const match = IP_PATTERN.exec(line);
  return match ? match[0] : null;
}

/**
 * Read an access log line by line and collect the first IP of every line
 * that has one.
 */
export async function loadIpAddresses(filePath: string): Promise<string[]> {
  const handle = await fs.open(filePath, 'r');
  const addresses: string[] = [];

  try {
    for await (const line of handle.readLines({ encoding: 'utf8' })) {
      const ip = extractIpAddress(line);
      if (ip !== null) {
        addresses.push(ip);
      }
    }
  } finally {
    await handle.close();
  }

  return addresses;
}
