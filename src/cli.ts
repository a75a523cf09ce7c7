import { loadConfig, resolveTitle, TocgenConfig } from './config.js';
import { UsageError } from './errors.js';
import { DEFAULT_INDENT, generateToc } from './generate.js';
import { readDocument, writeToc } from './loader.js';
import { getVersion } from './version.js';

export const USAGE = `Usage: tocgen [options] <infile>

Generate a table of contents for a Markdown or HTML document.

Options:
  -i, --indent <n>            Width of each indentation level (default: 4)
  -f, --format <format>       Output format: markdown or html (default: markdown)
  -c, --use-custom-anchors    Honor "## Heading {#anchor}" markers in Markdown input
  -o, --outfile <path>        Write to a file instead of stdout
  -t, --title <text>          Heading printed above the list (default: "Table of Contents")
      --no-title              Print the list without a heading
  -v, --version               Print the version
  -h, --help                  Show this help`;

/**
 * Parsed command line
 */
export interface CliOptions {
  infile?: string;
  indent?: number;
  format?: string;
  customAnchors: boolean;
  outfile?: string;
  /** null when --no-title was given */
  title?: string | null;
  help: boolean;
  version: boolean;
}

const VALUE_FLAGS = new Map<string, 'indent' | 'format' | 'outfile' | 'title'>([
  ['-i', 'indent'],
  ['--indent', 'indent'],
  ['-f', 'format'],
  ['--format', 'format'],
  ['-o', 'outfile'],
  ['--outfile', 'outfile'],
  ['-t', 'title'],
  ['--title', 'title']
]);

function parseIndent(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new UsageError(`Invalid indent: ${value}`);
  }
  return n;
}

/**
 * Parse argv (without the node and script entries).
 * Value flags accept both "--flag value" and "--flag=value".
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { customAnchors: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    if (flag === '-h' || flag === '--help') {
      options.help = true;
    } else if (flag === '-v' || flag === '--version') {
      options.version = true;
    } else if (flag === '-c' || flag === '--use-custom-anchors') {
      options.customAnchors = true;
    } else if (flag === '--no-title') {
      options.title = null;
    } else if (VALUE_FLAGS.has(flag)) {
      let value: string | undefined;
      if (eq > 0) {
        value = arg.slice(eq + 1);
      } else {
        i++;
        value = args[i];
      }
      if (value === undefined) {
        throw new UsageError(`Missing value for ${flag}`);
      }

      const key = VALUE_FLAGS.get(flag);
      if (key === 'indent') {
        options.indent = parseIndent(value);
      } else if (key !== undefined) {
        options[key] = value;
      }
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (options.infile === undefined) {
      options.infile = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}

/**
 * Command-line options win over the config file, which wins over defaults
 */
function resolveOutput(options: CliOptions, config: TocgenConfig) {
  return {
    outputFormat: options.format ?? config.outputFormat ?? 'markdown',
    indent: options.indent ?? config.indent ?? DEFAULT_INDENT,
    customAnchors: options.customAnchors || (config.customAnchors ?? false),
    title: options.title === undefined ? resolveTitle(config) : options.title ?? undefined
  };
}

/**
 * Run the tool and return the process exit code
 */
export async function runCli(args: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`tocgen: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.version) {
    console.log(getVersion());
    return 0;
  }
  if (!options.infile) {
    console.error(`tocgen: missing input file\n\n${USAGE}`);
    return 1;
  }

  try {
    const config = await loadConfig();
    const output = resolveOutput(options, config);
    const document = readDocument(options.infile);
    const toc = generateToc(document.content, { inputFormat: document.inputFormat, ...output });
    writeToc(toc, options.outfile);
    if (options.outfile) {
      console.log(`Table of contents written: ${options.outfile}`);
    }
    return 0;
  } catch (err) {
    // TocError and fs errors alike end the run with a one-line message
    console.error(`tocgen: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
