import {
  CanActivate,
  Injectable,
  ServiceUnavailableException,
} from '@nestjs/common';
import { AnalyticsService } from './analytics.service';

/** 503 on analytics endpoints until the first load has been summarised */
@Injectable()
export class AnalyticsReadyGuard implements CanActivate {
  constructor(private readonly analyticsService: AnalyticsService) {}

  canActivate(): boolean {
    if (!this.analyticsService.isReady) {
      throw new ServiceUnavailableException(
        'The warehouse is still loading. Please try again in a few moments.',
      );
    }
    return true;
  }
}
