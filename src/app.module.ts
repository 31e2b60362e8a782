import { Module, MiddlewareConsumer, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module.js';
import { TimezoneMiddleware } from './common/middleware/timezone.middleware.js';
import { validateEnv } from './config/env.js';
import { AppController } from './app.controller.js';
import { AuthModule } from './modules/auth/auth.module.js';
import { DoctorModule } from './modules/doctor/doctor.module.js';
import { AvailabilityModule } from './modules/availability/availability.module.js';
import { AppointmentModule } from './modules/appointment/appointment.module.js';
import { PaymentModule } from './modules/payment/payment.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
    DatabaseModule,
    AuthModule,
    DoctorModule,
    AvailabilityModule,
    AppointmentModule,
    PaymentModule,
  ],
  controllers: [AppController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(TimezoneMiddleware)
      .exclude('health', 'docs', 'docs/{*path}')
      .forRoutes('{*path}');
  }
}
