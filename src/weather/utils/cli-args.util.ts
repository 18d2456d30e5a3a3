// src/weather/utils/cli-args.util.ts

export interface CliArgs {
  city: string;
  exclude: string;
  sequential: boolean;
  help: boolean;
  /** 无法识别的参数 */
  unknown: string[];
}

/**
 * 解析命令行参数
 *
 * 城市名可以不加引号：--city New York
 * 含逗号的独立参数视为排除列表：--city Berlin wttr.in,WeatherAPI.com
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const cityParts: string[] = [];
  const excludeParts: string[] = [];
  const result: CliArgs = { city: '', exclude: '', sequential: false, help: false, unknown: [] };

  // 收集后续非选项参数
  const collect = (start: number, accept: (arg: string) => boolean, into: string[]): number => {
    let i = start;
    while (i + 1 < argv.length && !argv[i + 1].startsWith('--') && accept(argv[i + 1])) {
      into.push(argv[i + 1]);
      i++;
    }
    return i;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--city=')) {
      cityParts.push(arg.slice('--city='.length));
    } else if (arg === '--city') {
      i = collect(i, (next) => !next.includes(','), cityParts);
    } else if (arg.startsWith('--exclude=')) {
      excludeParts.push(arg.slice('--exclude='.length));
    } else if (arg === '--exclude') {
      i = collect(i, () => true, excludeParts);
    } else if (arg === '--sequential') {
      result.sequential = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('-')) {
      result.unknown.push(arg);
    } else if (arg.includes(',')) {
      excludeParts.push(arg);
    } else {
      cityParts.push(arg);
    }
  }

  result.city = cityParts.join(' ');
  result.exclude = excludeParts.join(',');
  return result;
}
