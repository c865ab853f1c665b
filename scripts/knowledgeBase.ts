// scripts/knowledgeBase.ts
// Purpose: run knowledge-base maintenance from a shell.
// Usage:
//   npx tsx scripts/knowledgeBase.ts status
//   npx tsx scripts/knowledgeBase.ts index            # every supported file
//   npx tsx scripts/knowledgeBase.ts index --new      # only files missing from the index
//   npx tsx scripts/knowledgeBase.ts index --file=Policy.pdf
//   npx tsx scripts/knowledgeBase.ts rebuild --yes    # deletes every collection first
//   npx tsx scripts/knowledgeBase.ts reconcile
//   npx tsx scripts/knowledgeBase.ts evaluate [--cases=path/to/cases.json]

import { promises as fs } from 'node:fs';
import { parseEvaluationCases, runEvaluation, sampleTestQueries } from '../src/evaluation/harness';
import { createLogger } from '../src/observability/logger';
import { createServices } from '../src/services';

const log = createLogger('scripts/knowledgeBase');

type Command = 'status' | 'index' | 'rebuild' | 'reconcile' | 'evaluate';
const COMMANDS: readonly Command[] = ['status', 'index', 'rebuild', 'reconcile', 'evaluate'];

type Flags = { command?: Command; file?: string; cases?: string; onlyNew: boolean; yes: boolean };
function parseFlags(argv: string[]): Flags {
  const f: Flags = { onlyNew: false, yes: false };
  for (const a of argv.slice(2)) {
    const command = COMMANDS.find((c) => c === a);
    if (command) f.command = command;
    else if (a.startsWith('--file=')) f.file = a.slice('--file='.length);
    else if (a.startsWith('--cases=')) f.cases = a.slice('--cases='.length);
    else if (a === '--new') f.onlyNew = true;
    else if (a === '--yes' || a === '-y') f.yes = true;
  }
  return f;
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function main(): Promise<number> {
  const flags = parseFlags(process.argv);
  if (!flags.command) {
    process.stderr.write(`Usage: knowledgeBase.ts <${COMMANDS.join('|')}> [flags]\n`);
    return 2;
  }

  const { kb, evaluations, eligibility } = createServices();
  await kb.init();
  eligibility.close();

  switch (flags.command) {
    case 'status':
      print(await kb.getStatus());
      return 0;

    case 'index': {
      if (flags.file) {
        const result = await kb.indexDocument(flags.file);
        print(result);
        return result.success ? 0 : 1;
      }
      const batch = flags.onlyNew ? await kb.autoIndexNewFiles() : await kb.indexAllDocuments();
      print(batch);
      return batch.failed === 0 ? 0 : 1;
    }

    case 'rebuild': {
      if (!flags.yes) {
        process.stderr.write('rebuild deletes every collection; re-run with --yes to confirm\n');
        return 2;
      }
      const result = await kb.rebuildIndex({ confirm: true });
      print(result);
      return result.failed === 0 && result.collectionErrors.length === 0 ? 0 : 1;
    }

    case 'reconcile': {
      const result = await kb.reconcile();
      print(result);
      return result.errors.length === 0 ? 0 : 1;
    }

    case 'evaluate': {
      let cases = sampleTestQueries();
      if (flags.cases) {
        const parsed = parseEvaluationCases(JSON.parse(await fs.readFile(flags.cases, 'utf8')));
        if (!parsed) {
          process.stderr.write(`${flags.cases} is not a list of evaluation cases\n`);
          return 2;
        }
        cases = parsed;
      }
      const run = await runEvaluation(kb, cases);
      const saved = await evaluations.saveRun(run);
      print({ summary: run.summary, skipped: run.skipped, saved });
      return saved.persisted ? 0 : 1;
    }
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log.fatal({ err }, 'Knowledge base command failed');
    process.exit(1);
  });
