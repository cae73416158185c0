export interface CliArgs {
  pdfPath?: string;
  model?: string;
  numSplits?: number;
  overlapRatio?: number;
  threshold?: number;
  concurrency?: number;
  stream?: boolean;
  outputDir?: string;
  format: 'text' | 'json';
  help: boolean;
  unknown: string[];
}

export const HELP = `
PDF Vision Extract - Transcribe PDF pages with a vision model

Usage:
  pdf-extract <pdf_path> [options]

Options:
  --model <name>          Vision model to use (default: LLM_MODEL or provider default)
  --num-splits <n>        Strips per page; 1 disables splitting (default: 4)
  --overlap-ratio <r>     Overlap between strips, 0 <= r < 1 (default: 0.1)
  --threshold <t>         Similarity above which repeated lines are dropped (default: 0.7)
  --concurrency <n>       Strips transcribed at once (default: 1)
  --stream, --no-stream   Echo model output as it arrives
  --output-dir <dir>      Where to write <name>_extracted.md (default: beside the PDF)
  --format <fmt>          Summary format: text or json (default: text)
  --help                  Show this help message

Examples:
  pdf-extract ./scan.pdf
  pdf-extract ./scan.pdf --num-splits 6 --overlap-ratio 0.15
  pdf-extract ./scan.pdf --model llava:13b --stream
  pdf-extract ./scan.pdf --concurrency 4 --format json
`;

export const parseArgs = (argv: readonly string[]): CliArgs => {
  const args: CliArgs = { format: 'text', help: false, unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--model':
        args.model = argv[++i];
        break;
      case '--num-splits':
      case '--num_splits':
        args.numSplits = Number(argv[++i]);
        break;
      case '--overlap-ratio':
      case '--overlap_ratio':
        args.overlapRatio = Number(argv[++i]);
        break;
      case '--threshold':
        args.threshold = Number(argv[++i]);
        break;
      case '--concurrency':
        args.concurrency = Number(argv[++i]);
        break;
      case '--stream':
        args.stream = true;
        break;
      case '--no-stream':
        args.stream = false;
        break;
      case '--output-dir':
        args.outputDir = argv[++i];
        break;
      case '--format': {
        const format = argv[++i];
        if (format === 'json' || format === 'text') {
          args.format = format;
        } else {
          args.unknown.push(`--format ${format ?? ''}`.trim());
        }
        break;
      }
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-') || args.pdfPath) {
          args.unknown.push(arg);
        } else {
          args.pdfPath = arg;
        }
    }
  }

  return args;
};
