/**
 * Echo server: minimal example of a payload-gate HTTP service.
 *
 * POST /items with `{"name": "...", "qty": "3"}` answers
 * `{"name": "...", "qty": 3}`; anything the schema rejects gets a 422.
 */

import { createServer } from 'node:http';
import {
  AjvSchema,
  createRequestListener,
  initialize,
  Pipeline,
  type Route,
} from '../../src/index.js';

const itemSchema = new AjvSchema({
  schema: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1 },
      qty: { type: 'integer', minimum: 0 },
    },
    required: ['name'],
    additionalProperties: false,
  },
});

const items: Route = {
  resource: { post_schema: itemSchema },
  responder: (req, resp) => {
    req.context.set('result', req.context.get('json'));
    resp.status = 201;
  },
};

const { pipeline: config } = initialize();

const listener = createRequestListener({
  pipeline: new Pipeline(config),
  resolveRoute: (_method, path) => (path === '/items' ? items : undefined),
});

createServer(listener).listen(Number(process.env['PORT'] ?? 8080));
