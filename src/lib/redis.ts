import Redis from 'ioredis';

let client: Redis | null = null;
let errorLogged = false;

// Cache-only client: commands fail fast when Redis is away and callers fall
// back to computing the value themselves.
function getRedis(url: string) {
  if (!client) {
    client = new Redis(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 0,
      enableOfflineQueue: false,
      retryStrategy: () => null,
      reconnectOnError: () => false,
    });

    client.on('error', (err: Error) => {
      if (!errorLogged) {
        console.warn('[redis] connection error, leaderboard cache disabled:', err.message);
        errorLogged = true;
      }
    });
  }
  return client;
}

export async function ensureRedis(url: string) {
  const r = getRedis(url);
  if (r.status === 'wait' || r.status === 'end') {
    await r.connect();
  }
  return r;
}

export async function closeRedis() {
  if (client) {
    if (client.status === 'ready') await client.quit();
    else client.disconnect();
    client = null;
    errorLogged = false;
  }
}
