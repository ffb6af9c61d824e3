import { Controller, Get, Header } from '@nestjs/common';
import { DashboardService } from './dashboard.service';

@Controller()
export class DashboardController {
  public constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  public index(): Promise<string> {
    return this.dashboardService.renderIndex();
  }
}
