// scripts/weather.ts
/**
 * 命令行查询多数据源天气
 *
 * 运行方式: npm run weather -- --city <城市名> [--sequential] [--exclude a,b]
 * 或: ts-node scripts/weather.ts --city Munich
 *
 * API Key 从 .env 读取（见 SourceRegistryService）
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { AppModule } from '../src/app.module';
import { WeatherQueryDto } from '../src/weather/dto/weather-query.dto';
import { WeatherService } from '../src/weather/services/weather.service';
import { NoSourcesError } from '../src/weather/weather.errors';
import { parseCliArgs } from '../src/weather/utils/cli-args.util';
import { formatReport } from '../src/weather/utils/report-formatter.util';

function printUsage(): void {
  console.log(`
使用方法:
  npm run weather -- --city <city> [OPTIONS]

选项:
  --city        城市名（必填，可以包含空格）
  --sequential  顺序获取（用于对比并发耗时）
  --exclude     要跳过的数据源，逗号分隔

示例:
  npm run weather -- --city New York
  npm run weather -- --city "O'Brien"
  npm run weather -- --city Berlin --exclude WeatherAPI.com
`);
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    printUsage();
    return 0;
  }
  if (args.unknown.length > 0) {
    console.error(`❌ 未知参数: ${args.unknown.join(' ')}`);
    printUsage();
    return 1;
  }

  const query = plainToInstance(WeatherQueryDto, {
    city: args.city,
    sequential: args.sequential,
    exclude: args.exclude || undefined,
  });
  const errors = await validate(query);
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    console.error(`❌ Error: ${messages[0] ?? 'invalid arguments'}`);
    printUsage();
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });

  try {
    const report = await app.get(WeatherService).getWeather(query);
    console.log(formatReport(report).join('\n'));
    return 0;
  } catch (error) {
    if (error instanceof NoSourcesError) {
      console.error(`❌ Error: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error('❌ 执行失败:', error);
      process.exit(1);
    });
}
