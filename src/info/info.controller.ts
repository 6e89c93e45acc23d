/**
 * Info Controller
 * Describes the service and its endpoints
 */

import { Controller, Get } from '@nestjs/common';

const PAGINATION = {
  limit: 'integer >= 0 (optional, default 20)',
  offset: 'integer >= 0 (optional, default 0)',
};

@Controller()
export class InfoController {
  @Get()
  getServiceInfo() {
    return {
      service: 'email-inbox-api',
      description: 'Stores inbound email records and reads cases, AI decisions and risk events',
      version: '1.0.0',
      endpoints: [
        { method: 'GET', path: '/health', description: 'Service and database reachability' },
        {
          method: 'POST',
          path: '/email-inbox',
          description: 'Store one inbound email; from_email and to_email must be valid addresses',
        },
        {
          method: 'GET',
          path: '/email-inbox',
          description: 'Emails, newest received first',
          queryParameters: PAGINATION,
        },
        { method: 'GET', path: '/email-inbox/:id', description: 'One email by email_id' },
        { method: 'GET', path: '/cases', description: 'Cases, newest first', queryParameters: PAGINATION },
        {
          method: 'GET',
          path: '/ai-decisions',
          description: 'AI decisions, newest first',
          queryParameters: PAGINATION,
        },
        {
          method: 'GET',
          path: '/risk-events',
          description: 'Risk events, newest first',
          queryParameters: PAGINATION,
        },
      ],
      timestamp: new Date().toISOString(),
    };
  }
}
