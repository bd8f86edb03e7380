import http from 'node:http';
import { once } from 'node:events';
import { randomUUID } from 'node:crypto';
import { loadEnvFiles } from '../src/env.js';
import { authorizeUrl, exchangeAuthorizationCode } from '../src/providers/ticktick.js';

loadEnvFiles();

const port = Number(process.env.TICKTICK_OAUTH_PORT ?? 53682);
const redirectUri = `http://localhost:${port}/callback`;

const clientId = process.env.TICKTICK_CLIENT_ID;
const clientSecret = process.env.TICKTICK_CLIENT_SECRET;

if (!clientId || !clientSecret) {
  console.error('Missing env vars: TICKTICK_CLIENT_ID, TICKTICK_CLIENT_SECRET');
  process.exit(2);
}

const state = randomUUID();

async function main(id: string, secret: string) {
  console.log('TickTick OAuth access-token helper');
  console.log('Redirect URI (register it on the developer app):', redirectUri);
  console.log('\n1) Open this URL in your browser and consent:');
  console.log(authorizeUrl(id, redirectUri, state));

  const server = http
    .createServer(async (req, res) => {
      try {
        const u = new URL(req.url ?? '/', `http://localhost:${port}`);
        if (u.pathname !== '/callback') {
          res.writeHead(404);
          res.end('Not found');
          return;
        }

        const code = u.searchParams.get('code');
        if (!code || u.searchParams.get('state') !== state) {
          res.writeHead(400);
          res.end('Missing code or state mismatch');
          return;
        }

        const token = await exchangeAuthorizationCode({ clientId: id, clientSecret: secret, redirectUri }, code);

        res.writeHead(200, { 'content-type': 'text/plain' });
        res.end('Done. You can close this tab and go back to your terminal.');

        console.log('\n2) Set env var:');
        console.log(`TICKTICK_ACCESS_TOKEN=${token.access_token}`);

        server.close();
      } catch (e) {
        res.writeHead(500);
        res.end('Internal error');
        console.error(e);
        server.close();
        process.exitCode = 1;
      }
    })
    .listen(port);

  await once(server, 'listening');
}

main(clientId, clientSecret).catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
