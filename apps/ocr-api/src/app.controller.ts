import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfiguration } from './config/configuration.interface';

@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService<AppConfiguration, true>) {}

  @Get()
  welcome(): { message: string } {
    const { title } = this.configService.get('app', { infer: true });
    return { message: `Welcome to ${title}` };
  }
}
