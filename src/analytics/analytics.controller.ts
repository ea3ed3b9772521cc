import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnalyticsService } from './analytics.service';
import { AnalyticsReadyGuard } from './analytics-ready.guard';

@ApiTags('Analytics')
@Controller('analytics')
@UseGuards(AnalyticsReadyGuard)
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get('summary')
  @ApiOperation({
    summary: 'Sales Summary',
    description:
      'Headline metrics over every fact row. `net_sales` is the sum of `net_amount` ' +
      '(quantity × unit price, returns negative). `return_rate_pct` is return lines ÷ all lines × 100, 2dp.',
  })
  @ApiResponse({
    status: 200,
    description: 'Totals in the source currency, rounded to 2dp.',
    content: {
      'application/json': {
        example: {
          net_sales: 17374804.27,
          gross_sales: 18256532.13,
          returns_value: -881727.86,
          line_count: 1033036,
          return_line_count: 19494,
          return_rate_pct: 1.89,
          invoice_count: 44876,
          customer_count: 5878,
        },
      },
    },
  })
  @ApiResponse({ status: 503, description: 'The warehouse is still loading. Retry in a few moments.' })
  getSummary() {
    return this.analyticsService.getSummary();
  }

  @Get('monthly-sales')
  @ApiOperation({
    summary: 'Monthly Net Sales',
    description: 'Net sales per calendar month of the invoice date, keyed by `YYYY-MM`, in chronological order.',
  })
  @ApiResponse({
    status: 200,
    description: 'Object keyed by `YYYY-MM` with net sales (2dp) as the value.',
    content: {
      'application/json': {
        example: { '2010-12': 683504.01, '2011-01': 554604.02, '2011-02': 498062.65 },
      },
    },
  })
  @ApiResponse({ status: 503, description: 'The warehouse is still loading. Retry in a few moments.' })
  getMonthlySales() {
    return this.analyticsService.getMonthlySales();
  }

  @Get('top-products')
  @ApiOperation({
    summary: 'Top Products',
    description: 'The ten products with the highest net sales, returns included.',
  })
  @ApiResponse({
    status: 200,
    description: 'Array of `{ stock_code, description, quantity, net_sales }`, highest net sales first.',
    content: {
      'application/json': {
        example: [
          { stock_code: '22423', description: 'REGENCY CAKESTAND 3 TIER', quantity: 24139, net_sales: 277656.25 },
          { stock_code: '85123A', description: 'WHITE HANGING HEART T-LIGHT HOLDER', quantity: 91757, net_sales: 247048.01 },
        ],
      },
    },
  })
  @ApiResponse({ status: 503, description: 'The warehouse is still loading. Retry in a few moments.' })
  getTopProducts() {
    return this.analyticsService.getTopProducts();
  }

  @Get('sales-by-country')
  @ApiOperation({
    summary: 'Sales by Country',
    description: 'Net sales and line count per country, highest net sales first.',
  })
  @ApiResponse({
    status: 200,
    description: 'Array of `{ country, net_sales, line_count }`.',
    content: {
      'application/json': {
        example: [
          { country: 'United Kingdom', net_sales: 14389234.6, line_count: 941268 },
          { country: 'EIRE', net_sales: 578501.89, line_count: 17159 },
        ],
      },
    },
  })
  @ApiResponse({ status: 503, description: 'The warehouse is still loading. Retry in a few moments.' })
  getSalesByCountry() {
    return this.analyticsService.getSalesByCountry();
  }
}
