import fastJson from 'fast-json-stringify';

export type HealthStatus = 'ok' | 'terminating';

export interface HealthCheck {
  status: HealthStatus;
}

const serializeHealthCheck = fastJson({
  type: 'object',
  properties: {
    status: {
      type: 'string',
    },
  },
  required: ['status'],
});

export const stringifyHealthCheck = (health: HealthCheck): string =>
  serializeHealthCheck(health);
