#!/usr/bin/env npx tsx
/**
 * Test Runner
 *
 * Runs every test script in its own process.
 * Usage: npx tsx tests/runTests.ts
 */

import { spawn } from 'child_process';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

interface TestResult {
  name: string;
  passed: boolean;
}

const testFiles = [
  'imageEncoding.test.ts',
  'pdfRasterizer.test.ts',
  'layoutBlocks.test.ts',
  'documentClassifier.test.ts',
  'documentSource.test.ts',
  'mathpixClient.test.ts',
  'engines.test.ts',
  'engineRegistry.test.ts',
  'pdfConverter.test.ts',
  'toolContent.test.ts',
  'config.test.ts',
  'cliArgs.test.ts',
];

function runTest(testFile: string): Promise<TestResult> {
  return new Promise((resolve) => {
    const child = spawn(process.execPath, ['--import', 'tsx', join(__dirname, testFile)], {
      cwd: join(__dirname, '..'),
      env: { ...process.env, NODE_ENV: 'test' },
      stdio: 'inherit',
    });

    child.on('error', (error) => {
      console.error(`  Could not start ${testFile}: ${error.message}`);
      resolve({ name: testFile, passed: false });
    });

    child.on('close', (code) => {
      resolve({ name: testFile, passed: code === 0 });
    });
  });
}

async function main(): Promise<number> {
  console.log('');
  console.log('PDF PACKET TEST SUITE');
  console.log('');

  const results: TestResult[] = [];

  for (const testFile of testFiles) {
    console.log(`\n${'━'.repeat(60)}`);
    console.log(`Running: ${testFile}`);
    console.log('━'.repeat(60));

    results.push(await runTest(testFile));
  }

  console.log('\n');
  console.log('TEST SUMMARY');
  console.log('');

  for (const result of results) {
    const status = result.passed ? '✓ PASS' : '✗ FAIL';
    console.log(`  ${status}: ${result.name}`);
  }

  const passedCount = results.filter((r) => r.passed).length;
  const failedCount = results.length - passedCount;

  console.log('');
  console.log(`Total: ${passedCount} passed, ${failedCount} failed`);
  console.log('');

  return failedCount > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
