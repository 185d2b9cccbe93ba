import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { version } from '../../../package.json';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Mergington High School Activities API',
      version: version,
      description: 'Browse extracurricular activities and sign students up or unregister them by email.',
    },
  },
  // 扫描路由文件中的 @openapi 注释（源码运行时是 .ts，编译后是 .js）
  apis: [path.join(__dirname, '../routes/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
