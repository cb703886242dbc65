#!/usr/bin/env npx tsx
/**
 * pdf-packet command line
 *
 * Usage: npx tsx src/cli.ts convert <document-id> [--out dir] [--engine name] [--json]
 *        npx tsx src/cli.ts search <query> [--max n]
 *        npx tsx src/cli.ts suggest <document-id>
 *        npx tsx src/cli.ts engines
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, parse } from 'path';
import { convertArgs, flagString, parseArgs } from './cliArgs';
import { buildEngineRegistry, loadConfig } from './config';
import { FileSystemDocumentSource } from './services/documentSource';
import { PdfConverter } from './services/pdfConverter';
import { suggestDocumentType } from './utils/documentClassifier';
import { describeError, isPipelineError } from './utils/errors';
import { setLogLevel } from './utils/logger';
import { toToolContent } from './utils/toolContent';

function printUsage(): void {
  console.log('Usage:');
  console.log('  pdf-packet convert <document-id> [--out dir] [--engine name] [--json]');
  console.log('  pdf-packet search <query> [--max n]');
  console.log('  pdf-packet suggest <document-id>');
  console.log('  pdf-packet engines');
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const source = new FileSystemDocumentSource(config.documentsDir);
  const registry = buildEngineRegistry(config);

  try {
    switch (args.command) {
      case 'convert': {
        const { documentId, engineName, outDir, json } = convertArgs(args);
        if (!documentId) {
          printUsage();
          return 2;
        }

        const controller = new AbortController();
        const onSigint = () => controller.abort(new Error('interrupted'));
        process.once('SIGINT', onSigint);

        try {
          const converter = new PdfConverter({ source, registry, engineName, dpi: config.dpi });
          const result = await converter.convert(documentId, { signal: controller.signal });

          if (json) {
            process.stdout.write(`${JSON.stringify(toToolContent(result))}\n`);
            return 0;
          }

          const stem = parse(documentId).name;
          await mkdir(outDir, { recursive: true });
          await writeFile(join(outDir, `${stem}.md`), result.recognizedText);
          for (const image of result.pageImages) {
            await writeFile(join(outDir, `${stem}-page-${image.pageIndex + 1}.png`), image.data);
          }
          console.log(`Converted ${documentId}: ${result.pageImages.length} pages via ${result.engineUsed} -> ${outDir}`);
          return 0;
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      }

      case 'search': {
        const query = args.positional.join(' ');
        const max = Number(flagString(args, 'max') ?? '');
        const results = await source.search(query, Number.isFinite(max) && max > 0 ? max : undefined);
        console.log(JSON.stringify(results, null, 2));
        return 0;
      }

      case 'suggest': {
        const [documentId] = args.positional;
        if (!documentId) {
          printUsage();
          return 2;
        }
        const summary = await source.describe(documentId);
        const suggestion = suggestDocumentType(summary.name, summary.size);
        const engine = registry.suggest(suggestion.recommendedType, summary.size);
        console.log(JSON.stringify({ documentId, fileSize: summary.size, suggestion, engine }, null, 2));
        return 0;
      }

      case 'engines':
        console.log(JSON.stringify({ default: registry.defaultName, engines: registry.list() }, null, 2));
        return 0;

      default:
        printUsage();
        return args.command === 'help' ? 0 : 2;
    }
  } catch (error) {
    if (isPipelineError(error)) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error(JSON.stringify(describeError(error)));
    }
    return 1;
  } finally {
    await registry.disposeAll();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
