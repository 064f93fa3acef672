export interface CliArgs {
  input?: string;
  cfr?: string;
  output?: string;
  threshold?: number;
  reset?: boolean;
  skipGraph?: boolean;
  format?: 'table' | 'json';
  help?: boolean;
  errors: string[];
}

export const HELP = `
Incident Graph Build - Upsert incidents into Neo4j and link similar incidents

Usage:
  npm run build-graph -- [options]

Options:
  --input <path>       JSON Lines file of entity-enriched incident records
  --cfr <path>         CFR reference table (CSV or spreadsheet)
  --output <path>      Linked-incidents CSV to write
  --threshold <n>      Similarity threshold in [0, 1] (default: SIMILARITY_THRESHOLD)
  --reset              Delete every node and relationship before building
  --skip-graph         Only compute the similarity artifact, do not touch Neo4j
  --format <fmt>       Output format: table or json (default: table)
  --help               Show this help message

Examples:
  npm run build-graph -- --input ./data/processed/ler_kg.jsonl --cfr ./data/raw/cfr.csv
  npm run build-graph -- --threshold 0.75 --format json
  npm run build-graph -- --skip-graph --output ./out/links.csv
`;

export const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = { errors: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        args.input = argv[++i];
        break;
      case '--cfr':
        args.cfr = argv[++i];
        break;
      case '--output':
        args.output = argv[++i];
        break;
      case '--threshold': {
        const raw = argv[++i];
        const value = Number(raw);
        if (raw === undefined || raw.trim() === '' || Number.isNaN(value) || value < 0 || value > 1) {
          args.errors.push(`--threshold must be a number between 0 and 1, got ${raw ?? 'nothing'}`);
        } else {
          args.threshold = value;
        }
        break;
      }
      case '--reset':
        args.reset = true;
        break;
      case '--skip-graph':
        args.skipGraph = true;
        break;
      case '--format': {
        const format = argv[++i];
        if (format === 'table' || format === 'json') {
          args.format = format;
        } else {
          args.errors.push(`--format must be table or json, got ${format ?? 'nothing'}`);
        }
        break;
      }
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        args.errors.push(`Unknown option: ${arg}`);
    }
  }

  return args;
};
