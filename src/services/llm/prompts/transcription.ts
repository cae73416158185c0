export const TRANSCRIPTION_PROMPT =
  'Extract all the text from this document page. Maintain the original formatting and structure as much as possible. Only return the extracted text, no additional commentary.';

export const toDataUrl = (image: Buffer, mimeType = 'image/png'): string =>
  `data:${mimeType};base64,${image.toString('base64')}`;
