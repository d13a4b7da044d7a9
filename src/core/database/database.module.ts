import { Module } from '@nestjs/common';
import { MongooseModule, MongooseModuleFactoryOptions } from '@nestjs/mongoose';
import { ConfigModule, ConfigService } from '@nestjs/config';

@Module({
  imports: [
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: async (configService: ConfigService): Promise<MongooseModuleFactoryOptions> => {
        const isProduction =
          configService.get<string>('app.env') === 'production';
        const mongoUri =
          configService.get<string>('database.mongodb.uri') ||
          'mongodb://localhost:27017/shift-scheduling';

        return {
          uri: mongoUri,
          // Connection pool
          minPoolSize: isProduction ? 2 : 1,
          maxPoolSize: isProduction ? 10 : 5,
          // Timeouts
          connectTimeoutMS: 10000,
          socketTimeoutMS: 45000,
          serverSelectionTimeoutMS: 5000,
        };
      },
      inject: [ConfigService],
    }),
  ],
  exports: [MongooseModule],
})
export class DatabaseModule {}
