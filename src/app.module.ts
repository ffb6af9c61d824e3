// src/app.module.ts
import { Module } from '@nestjs/common';
import { AppConfigModule } from './config/app-config.module';
import { DashboardModule } from './modules/dashboard/dashboard.module';
import { HealthModule } from './modules/health/health.module';
import { StatusModule } from './modules/status/status.module';

@Module({
  imports: [AppConfigModule, StatusModule, HealthModule, DashboardModule],
})
export class AppModule {}
