import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { clearConnection } from './lib/connection.js';
import { connect } from './services/authService.js';

const config = loadConfig();
const app = buildApp(config);

if (config.refreshToken && config.orgId) {
  await connect({
    refreshToken: config.refreshToken,
    orgId: config.orgId,
    cspServer: config.cspServer,
    vmcServer: config.vmcServer,
  });
  app.log.warn('the access token is not renewed; restart the server once it expires or /usage routes answer 502');
} else {
  app.log.warn('VMC_REFRESH_TOKEN or VMC_ORG_ID not set; /usage routes will answer 503');
}

app.addHook('onClose', async () => {
  clearConnection();
});

app.listen({ port: config.port, host: config.host }).then(() => {
  app.log.info(`vmc-usage listening on ${config.host}:${config.port}`);
}).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
