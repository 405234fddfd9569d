import { Hono, type Context } from 'hono';
import type { ActivityStore } from '../../activities/activity-store.js';
import { RegistryError } from '../../activities/errors.js';
import { logger } from '../../utils/logger.js';

function missingEmail(c: Context) {
  return c.json({ detail: "Query parameter 'email' is required" }, 422);
}

export function createActivitiesRoutes(store: ActivityStore) {
  const activities = new Hono();

  // GET /activities - full registry
  activities.get('/', (c) => c.json(store.list()));

  // POST /activities/:name/signup?email=
  activities.post('/:name/signup', (c) => {
    const name = c.req.param('name');
    const email = c.req.query('email');
    if (email === undefined) return missingEmail(c);

    try {
      store.signup(name, email);
    } catch (err) {
      if (err instanceof RegistryError) {
        logger.debug('ACTIVITIES', `Signup rejected (${name}, ${email}): ${err.message}`);
        return c.json({ detail: err.message }, err.status);
      }
      throw err;
    }

    logger.info('ACTIVITIES', `${email} → ${name}`);
    return c.json({ message: `${email} signed up for ${name}` });
  });

  // DELETE /activities/:name/unregister?email=
  activities.delete('/:name/unregister', (c) => {
    const name = c.req.param('name');
    const email = c.req.query('email');
    if (email === undefined) return missingEmail(c);

    try {
      store.unregister(name, email);
    } catch (err) {
      if (err instanceof RegistryError) {
        logger.debug('ACTIVITIES', `Unregister rejected (${name}, ${email}): ${err.message}`);
        return c.json({ detail: err.message }, err.status);
      }
      throw err;
    }

    logger.info('ACTIVITIES', `${email} ← ${name}`);
    return c.json({ message: `${email} unregistered from ${name}` });
  });

  return activities;
}
