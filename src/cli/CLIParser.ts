import { SketchConfig, DEFAULT_CONFIG, resolveSketchConfig } from '../common/Config';
import { ConfigurationError } from '../common/Errors';

export type Command = 'serve' | 'passwords' | 'compare';

export interface CLIOptions {
  readonly command: Command | null;
  readonly config: SketchConfig;
  readonly help: boolean;
  readonly existingPasswords: readonly string[];
  readonly inputs: readonly string[];
}

const VALUE_FLAGS = ['--http-port', '--capacity', '--hash-count', '--bucket-bits', '--existing'];

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h') || this.args.length === 0) {
      return { command: null, config: DEFAULT_CONFIG, help: true, existingPasswords: [], inputs: [] };
    }

    const [commandStr, ...inputs] = this.positionals();
    const command = this.parseCommand(commandStr);

    const capacity = this.getNumber('--capacity');
    const hashCount = this.getNumber('--hash-count');
    const bucketBits = this.getNumber('--bucket-bits');
    const httpPort = this.getNumber('--http-port');

    const config = resolveSketchConfig({
      ...(httpPort !== undefined && { httpPort }),
      filter: {
        ...(capacity !== undefined && { capacity }),
        ...(hashCount !== undefined && { hashCount }),
      },
      estimator: {
        ...(bucketBits !== undefined && { bucketBits }),
      },
    });

    if (command === 'compare' && inputs.length !== 1) {
      throw new ConfigurationError('compare requires exactly one log file path');
    }

    const existing = this.getString('--existing');
    const existingPasswords = existing ? existing.split(',').filter((pw) => pw.length > 0) : [];

    return { command, config, help: false, existingPasswords, inputs };
  }

  private parseCommand(value: string | undefined): Command {
    switch (value?.toLowerCase()) {
      case 'serve': return 'serve';
      case 'passwords': return 'passwords';
      case 'compare': return 'compare';
      default: throw new ConfigurationError(`Invalid command: ${value ?? '(none)'}. Must be serve, passwords, or compare`);
    }
  }

  /**
   * Arguments that are neither flags nor the value of a `--flag value` pair.
   */
  private positionals(): string[] {
    const result: string[] = [];
    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i] ?? '';
      if (arg.startsWith('-')) {
        if (VALUE_FLAGS.includes(arg)) {
          i++;
        }
        continue;
      }
      result.push(arg);
    }
    return result;
  }

  private getString(flag: string): string | undefined {
    const prefixed = this.args.find((arg) => arg.startsWith(`${flag}=`));
    if (prefixed !== undefined) {
      return prefixed.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    const num = Number(str);
    if (!/^-?\d+$/.test(str) || !Number.isSafeInteger(num)) {
      throw new ConfigurationError(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Sketchbook - Bloom filter and HyperLogLog toolkit

Usage: node dist/index.js <command> [options]

Commands:
  serve                   Run the HTTP API
  passwords PW...         Check passwords for uniqueness with a Bloom filter
  compare LOGFILE         Count distinct IPs in an access log, exact vs HyperLogLog

Options:
  --help, -h              Show this help message
  --http-port=PORT        HTTP server port (default: 3000)
  --capacity=BITS         Bloom filter size in bits (default: 1000)
  --hash-count=K          Bloom filter hash probes (default: 3)
  --existing=A,B,...      Passwords to add before checking (passwords command)
  --bucket-bits=B         HyperLogLog bucket bits, 4-24 (default: 10)

Examples:
  node dist/index.js passwords --existing=password123,admin123 password123 guest
  node dist/index.js compare ./access.log --bucket-bits=12
  node dist/index.js serve --http-port=8080
`);
  }
}
