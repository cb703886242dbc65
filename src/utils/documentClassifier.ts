import type { ConversionSuggestion } from '../types';

const LARGE_DOCUMENT_BYTES = 5 * 1024 * 1024;

/**
 * Guess the kind of document from its file name and size. Name keywords
 * win over size; everything else is treated as typed text.
 */
export function suggestDocumentType(fileName: string, sizeBytes: number): ConversionSuggestion {
  const name = fileName.toLowerCase();

  if (name.includes('note') || name.includes('sketch')) {
    return {
      recommendedType: 'handwritten',
      confidence: 0.7,
      reasoning: 'Filename suggests handwritten notes or sketches',
      alternativeTypes: ['mixed'],
    };
  }

  if (name.includes('paper') || name.includes('research') || name.includes('journal')) {
    return {
      recommendedType: 'research',
      confidence: 0.8,
      reasoning: 'Filename suggests academic or research content',
      alternativeTypes: ['typed'],
    };
  }

  if (name.includes('presentation') || name.includes('slide')) {
    return {
      recommendedType: 'mixed',
      confidence: 0.8,
      reasoning: 'Filename suggests presentation with mixed content',
      alternativeTypes: ['typed'],
    };
  }

  if (sizeBytes > LARGE_DOCUMENT_BYTES) {
    return {
      recommendedType: 'mixed',
      confidence: 0.6,
      reasoning: 'Large file size suggests complex document with mixed content',
      alternativeTypes: ['typed', 'research'],
    };
  }

  return {
    recommendedType: 'typed',
    confidence: 0.5,
    reasoning: 'Default suggestion for typical document',
    alternativeTypes: ['mixed', 'handwritten'],
  };
}
