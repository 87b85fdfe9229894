import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';

@ApiTags('Service')
@Controller()
export class AppController {
  @Get()
  @ApiOkResponse({ description: 'Service banner' })
  welcome() {
    return {
      ok: true,
      service: 'inventory-ledger-service',
      message: 'Inventory ledger API. Documentation at /api',
    };
  }
}
