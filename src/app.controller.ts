import { Controller, Get } from '@nestjs/common';
import { ApiExcludeEndpoint } from '@nestjs/swagger';

@Controller()
export class AppController {
  @Get()
  @ApiExcludeEndpoint()
  index() {
    return {
      name: 'Retail Sales Warehouse',
      description:
        'Star-schema warehouse of online retail order lines, with read-only sales metrics for dashboards.',
      version: '1.0.0',
      docs: '/docs',
      health: '/health',
      tables: ['dim_date', 'dim_product', 'dim_customer', 'dim_country', 'fact_sales'],
      endpoints: {
        summary: 'GET /analytics/summary',
        monthly_sales: 'GET /analytics/monthly-sales',
        top_products: 'GET /analytics/top-products',
        sales_by_country: 'GET /analytics/sales-by-country',
      },
    };
  }
}
