import pino from 'pino';

// stdout carries the reports, so diagnostics go to stderr.
export const logger = pino(
  {
    name: 'vmc-usage',
    level: process.env.LOG_LEVEL || 'info',
    redact: ['headers["csp-auth-token"]', 'refreshToken'],
  },
  pino.destination(2),
);
