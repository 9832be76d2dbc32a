import { MockAgent } from 'undici';
import { RobotsGuard } from '../src/scraper/robots.js';

/** An offline site whose robots.txt is missing, so every path is allowed. */
export function mockSite(origin: string) {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const pool = agent.get(origin);
  pool.intercept({ path: '/robots.txt' }).reply(404, '').persist();
  const robots = new RobotsGuard({ userAgent: 'test-agent', dispatcher: agent });
  return { agent, pool, robots };
}
