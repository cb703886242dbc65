import type { CombinedResult, ToolContent } from '../types';
import { EncodeError } from './errors';
import { encodeBase64, isTransportSafeBase64 } from './imageEncoding';

export function formatConversionReport(result: CombinedResult): string {
  return `# PDF Conversion Results

## OCR Output
${result.recognizedText}

## Processing Info
- Engine: ${result.engineUsed}
- Confidence: ${result.confidence.toFixed(2)}
- Processing time: ${result.processingTimeMs}ms
- Pages converted: ${result.pageImages.length}

## Instructions for LLM Refinement
The above is the OCR output. You also have access to the PNG images of each page below.
Please review both the OCR text and the images to create the most accurate Markdown conversion.
Correct any OCR errors you can identify by comparing with the visual images.
`;
}

/**
 * Render a conversion as one text block followed by one image block per
 * page, in page order. Each image is independently base64 encoded.
 */
export function toToolContent(result: CombinedResult): ToolContent[] {
  const content: ToolContent[] = [{ type: 'text', text: formatConversionReport(result) }];

  for (const image of result.pageImages) {
    const data = encodeBase64(image.data);
    if (!isTransportSafeBase64(data)) {
      throw new EncodeError(`Page ${image.pageIndex + 1} produced an invalid base64 payload`, image.pageIndex);
    }
    content.push({ type: 'image', data, mimeType: image.mimeType });
  }

  return content;
}
