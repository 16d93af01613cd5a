import assert from 'node:assert/strict';
import { db } from '../db';
import { logError, logInfo } from '../logger';
import { migrateLatest } from '../migrations';
import { createModel } from '../repositories/modelRepository';

interface CliArgs {
  name?: string;
  url?: string;
  credentialKey?: string;
  modelName?: string;
  inactive: boolean;
}

const VALUE_FLAGS: Record<string, 'name' | 'url' | 'credentialKey' | 'modelName'> = {
  '--name': 'name',
  '--url': 'url',
  '--credential-key': 'credentialKey',
  '--model-name': 'modelName'
};

function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { inactive: false };

  for (let i = 0; i < argv.length; i += 1) {
    const [flag, inlineValue] = argv[i].split(/=(.*)/s, 2);
    if (flag === '--inactive') {
      result.inactive = true;
      continue;
    }

    const field = VALUE_FLAGS[flag];
    if (!field) {
      continue;
    }

    if (inlineValue !== undefined) {
      result[field] = inlineValue;
    } else if (argv[i + 1] !== undefined) {
      result[field] = argv[i + 1];
      i += 1;
    }
  }

  return result;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  try {
    assert(args.name, 'A --name argument is required');
    assert(args.url, 'A --url argument is required');
    assert(args.credentialKey, 'A --credential-key argument is required');

    await migrateLatest();
    const model = await createModel({
      name: args.name,
      apiUrl: args.url,
      credentialKey: args.credentialKey,
      modelName: args.modelName ?? null,
      isActive: !args.inactive
    });
    logInfo('Created model via CLI', { id: model.id, name: model.name, isActive: model.isActive });
  } catch (error) {
    logError('Failed to create model', { error });
    process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

main();
