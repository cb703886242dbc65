/**
 * Document Classifier Unit Tests
 *
 * Tests document type suggestions from file names and sizes.
 */

import { suggestDocumentType } from '../src/utils/documentClassifier';
import { banner, finish, section, test } from './support/harness';

banner('DOCUMENT CLASSIFIER TESTS');

section('Type suggestions');

const MB = 1024 * 1024;

const cases = [
  { fileName: 'Lecture Notes.pdf', size: 100, expected: 'handwritten', confidence: 0.7 },
  { fileName: 'whiteboard-sketch.pdf', size: 100, expected: 'handwritten', confidence: 0.7 },
  { fileName: 'research-paper.pdf', size: 100, expected: 'research', confidence: 0.8 },
  { fileName: 'JOURNAL_2024.pdf', size: 100, expected: 'research', confidence: 0.8 },
  { fileName: 'kickoff-slides.pdf', size: 100, expected: 'mixed', confidence: 0.8 },
  { fileName: 'invoice.pdf', size: 6 * MB, expected: 'mixed', confidence: 0.6 },
  { fileName: 'invoice.pdf', size: 5 * MB, expected: 'typed', confidence: 0.5 },
  { fileName: 'notes-on-research.pdf', size: 100, expected: 'handwritten', confidence: 0.7 },
];

for (const { fileName, size, expected, confidence } of cases) {
  const suggestion = suggestDocumentType(fileName, size);
  test(
    `${fileName} (${size} bytes) -> ${expected}`,
    suggestion.recommendedType === expected && suggestion.confidence === confidence,
    `got ${suggestion.recommendedType} @ ${suggestion.confidence}`
  );
}

section('Alternatives');

const typed = suggestDocumentType('report.pdf', 1024);
test('Default suggestion offers alternatives', typed.alternativeTypes.join(',') === 'mixed,handwritten');
test('Default suggestion explains itself', typed.reasoning === 'Default suggestion for typical document');
test(
  'Alternatives never repeat the recommendation',
  cases.every(({ fileName, size }) => {
    const s = suggestDocumentType(fileName, size);
    return !s.alternativeTypes.includes(s.recommendedType);
  })
);

finish();
