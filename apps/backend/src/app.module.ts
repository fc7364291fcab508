import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { GlobalExceptionFilter } from './common/filters';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AcmeModule } from './acme/acme.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '../../.env',
    }),
    ScheduleModule.forRoot(),
    EventEmitterModule.forRoot(),
    AcmeModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    // Global exception filter - strips stack traces in production
    {
      provide: APP_FILTER,
      useClass: GlobalExceptionFilter,
    },
  ],
})
export class AppModule {}
