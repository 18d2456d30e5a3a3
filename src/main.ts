// src/main.ts
import 'reflect-metadata'; // 必须在最顶部导入，用于装饰器支持
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  
  // 启用全局验证管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: false, // 允许额外的属性
    })
  );
  
  app.enableCors();
  
  // ============================================
  // 📚 Swagger/OpenAPI 文档配置
  // ============================================
  const config = new DocumentBuilder()
    .setTitle('Weather Consensus API')
    .setDescription('多数据源天气聚合 API - 并发查询多个天气服务，统一格式并计算共识')
    .setVersion('1.0')
    .addTag('weather', '天气聚合相关接口')
    .addServer('http://localhost:3000', '开发环境')
    .build();
  
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Weather Consensus API 文档',
  });
  
  const port = process.env.PORT || 3000;
  await app.listen(port);
  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Application is running on: http://localhost:${port}`);
  logger.log(`📚 Swagger 文档: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  console.error('❌ 启动失败:', error);
  process.exit(1);
});
