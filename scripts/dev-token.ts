import 'dotenv/config';
import { resolveJwtSecret, signAccessToken } from '../src/lib/auth';

// Usage: npm run token -- <user-id> [role] [ttlSeconds]
const [sub, role = 'user', ttl = '3600'] = process.argv.slice(2);

if (!sub) {
  console.error('Usage: npm run token -- <user-id> [role] [ttlSeconds]');
  process.exit(1);
}

const ttlSeconds = Number(ttl);
if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
  console.error(`Invalid ttlSeconds: ${ttl}`);
  process.exit(1);
}

console.log(signAccessToken({ sub, role }, resolveJwtSecret(), ttlSeconds));
