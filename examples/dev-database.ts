/**
 * Starts a private postgres for local development and keeps it running
 * until Ctrl-C. The data directory is thrown away on exit.
 *
 * Run: npx tsx examples/dev-database.ts
 */
import { loadEnvConfig, startInstance } from '../src/index.js';

async function main() {
  const instance = await startInstance(loadEnvConfig());
  const su = instance.asSuperuser();
  await su.createUser('dev', 'dev');
  await su.createDatabase('dev', 'dev');

  console.log(`postgres running on port ${instance.port} (pid ${instance.pid})`);
  console.log(`Superuser:  ${instance.superuserUrl}`);
  console.log(`Developer:  ${instance.asUser('dev', 'dev').url('dev')}`);

  instance.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
    console.error(`postgres exited (code ${code}, signal ${signal})`);
    process.exitCode = 1;
  });

  process.once('SIGINT', () => {
    console.log('Stopping...');
    instance.stop().catch(console.error);
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
