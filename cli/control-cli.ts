/**
 * Interactive terminal client for a running fleet server. Maps `task`, `ping`
 * and `status` onto the control API.
 */

/* eslint-disable no-await-in-loop */

import { input } from '@inquirer/prompts';
import { HELP_TEXT, parseCommand } from './control-cli-helpers';
import { ControlClient, runCommand } from './control-client';

export async function main(): Promise<void> {
  const port = Number(process.env.PORT) || 3000;
  const client = new ControlClient({ baseUrl: process.env.FLEET_URL ?? `http://127.0.0.1:${port}` });
  console.log(`\nFleet control: ${client.baseUrl}\n`);

  try {
    if (!(await client.health())) {
      throw new Error('health check failed');
    }
  } catch (err) {
    console.error('✗ Cannot reach the fleet server:', err instanceof Error ? err.message : String(err));
    console.log('Start it with: npm start, or set FLEET_URL for a different endpoint.\n');
    process.exitCode = 1;
    return;
  }
  console.log(HELP_TEXT);

  for (;;) {
    const line = await input({ message: 'fleet>' });
    try {
      const output = await runCommand(client, parseCommand(line));
      if (output === null) {
        console.log('\nGoodbye.\n');
        return;
      }
      console.log(output);
    } catch (err) {
      console.error('✗', err instanceof Error ? err.message : String(err));
    }
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
