import crypto from 'node:crypto';

/**
 * Derives a stable locally administered unicast MAC from a player name so
 * the music server keeps recognising the player across restarts.
 */
export function generateMacAddress(name: string): string {
  const bytes = [...crypto.createHash('md5').update(name, 'utf8').digest().subarray(0, 6)];
  bytes[0] = (bytes[0] | 0x02) & 0xfe;
  return bytes.map((byte) => byte.toString(16).padStart(2, '0')).join(':');
}

const CLIENT_ID_PREFIX = 'sendspin';
const CLIENT_ID_NAME_LENGTH = 20;

export function generateClientId(name: string): string {
  const suffix = crypto.createHash('md5').update(name, 'utf8').digest('hex').slice(0, 8);
  const safeName = name.toLowerCase().replace(/ /g, '-').slice(0, CLIENT_ID_NAME_LENGTH);
  return `${CLIENT_ID_PREFIX}-${safeName}-${suffix}`;
}
