import path from 'path';
import { ConsoleReporter, LocalSandbox, Patcher, createSuperCallRules, loadConfig, resolveTargets } from '../src';

/**
 * Dry run over the sample target list. Pass a project root to check a real
 * checkout:
 *
 *   tsx examples/getting-started.ts ../my-mod
 */
async function main() {
  const config = await loadConfig(path.join(__dirname, 'behavior-targets.json'));
  const workDir = process.argv[2] ? path.resolve(process.argv[2]) : config.workDir;

  const sandbox = new LocalSandbox({ workDir });
  const patcher = new Patcher({
    sandbox,
    rules: createSuperCallRules({ indent: config.indent }),
    dryRun: true,
  });
  new ConsoleReporter({ verbose: true }).attach(patcher.events);

  const report = await patcher.run(await resolveTargets(config, sandbox));
  const skipped = report.outcomes.filter((o) => o.status === 'skipped').length;
  console.log(`${skipped} of ${report.outcomes.length} targets not found under ${workDir}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
