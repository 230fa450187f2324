import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

describe('MetricsController', () => {
  it('exposes the domain counters with the app label', async () => {
    const metrics = new MetricsService();
    metrics.bidsAcceptedTotal.inc();
    metrics.bidRejectionsTotal.inc({ reason_code: 'INSUFFICIENT_BID' });
    metrics.sessionExtensionsTotal.inc();

    const body = await new MetricsController(metrics).scrape();
    const lines = body.split('\n');

    expect(lines).toContain('bids_accepted_total{app="auction-service"} 1');
    expect(lines).toContain('bid_rejections_total{reason_code="INSUFFICIENT_BID",app="auction-service"} 1');
    expect(lines).toContain('session_extensions_total{app="auction-service"} 1');
  });
});
