import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import compression from 'compression';
import { ApiExceptionFilter } from './shared/filters/api-exception.filter';

export interface AppSetupOptions {
  apiPrefix: string;
  corsOrigins?: string[];
  production?: boolean;
  version?: string;
}

/**
 * HTTP pipeline shared by the server entry point and the e2e tests.
 */
export function configureApp(app: INestApplication, options: AppSetupOptions): void {
  // Security middleware
  app.use(helmet());
  app.use(compression());

  app.enableCors({
    origin: options.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Requested-With'],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties that do not have decorators
      forbidNonWhitelisted: true, // Reject unknown properties instead
      transform: true,
    }),
  );
  app.useGlobalFilters(new ApiExceptionFilter());

  app.setGlobalPrefix(options.apiPrefix);

  if (!options.production) {
    const config = new DocumentBuilder()
      .setTitle('Shift Scheduling API')
      .setDescription('Doctor registry, conflict-free shift scheduling, appointments and billing')
      .setVersion(options.version ?? '1.0.0')
      .addTag('Doctors', 'Doctor registry')
      .addTag('Shifts', 'Doctor shift booking and conflict detection')
      .addTag('Patients', 'Patient registry')
      .addTag('Appointments', 'Patient appointments within doctor shifts')
      .addTag('Billing', 'Consultation invoices')
      .addTag('Health', 'Service status')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(`${options.apiPrefix}/docs`, app, document);
  }
}
