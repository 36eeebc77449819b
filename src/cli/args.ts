export interface ListenOptions {
  device: number | null;
  listDevices: boolean;
  verbose: boolean;
  tui: boolean;
  configPath: string | null;
  help: boolean;
}

export const USAGE = `Usage: needledrop [options]

  -d, --device N       capture from card N (default: first USB input, else the first input)
  -l, --list-devices   list capture devices and exit
  -v, --verbose        log audio levels and every recognition sample
  -t, --tui            redraw a status panel instead of scrolling output
  -c, --config PATH    config file (default: ./config.json or $CONFIG_PATH)
  -h, --help           show this help`;

export function parseListenArgs(args: string[]): ListenOptions {
  const opts: ListenOptions = {
    device: null,
    listDevices: false,
    verbose: false,
    tui: false,
    configPath: null,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-d':
      case '--device': {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          throw new Error(`${arg} expects a device number`);
        }
        opts.device = Number(value);
        break;
      }
      case '-c':
      case '--config': {
        const value = args[++i];
        if (!value) throw new Error(`${arg} expects a path`);
        opts.configPath = value;
        break;
      }
      case '-l':
      case '--list-devices':
        opts.listDevices = true;
        break;
      case '-v':
      case '--verbose':
        opts.verbose = true;
        break;
      case '-t':
      case '--tui':
        opts.tui = true;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return opts;
}
