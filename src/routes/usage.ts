import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { registerUsageAuth } from '../services/usageAuth.js';
import { getDeploymentUsage } from '../services/deploymentService.js';
import { getSubscriptions } from '../services/subscriptionService.js';

export type UsageRoutesOptions = {
  apiToken?: string;
};

const deploymentQuerySchema = z.object({
  name: z.string().min(1).optional(),
  id: z.string().min(1).optional(),
});

const subscriptionQuerySchema = z.object({
  id: z.string().min(1).optional(),
  expand: z.enum(['true', 'false']).optional().transform((v) => v === 'true'),
});

const usageRoutes: FastifyPluginAsync<UsageRoutesOptions> = async (app, opts) => {
  registerUsageAuth(app, opts.apiToken);

  app.get('/deployments', async (req) => {
    const filter = deploymentQuerySchema.parse(req.query);
    return getDeploymentUsage(filter);
  });

  app.get('/subscriptions', async (req) => {
    const query = subscriptionQuerySchema.parse(req.query);
    return getSubscriptions(query);
  });
};

export default usageRoutes;
