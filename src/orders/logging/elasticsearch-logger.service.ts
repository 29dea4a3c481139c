import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client } from '@elastic/elasticsearch';
import { OrderAuditEvent } from '../enums/order.enums';

export const DEFAULT_AUDIT_INDEX = 'order-audit';

/**
 * Audit trail for order events. Entries always reach the application log;
 * they are also indexed when ELASTICSEARCH_NODE is configured.
 */
@Injectable()
export class ElasticsearchLoggerService {
  private readonly logger = new Logger(ElasticsearchLoggerService.name);
  private readonly client: Client | null;
  private readonly index: string;

  constructor(configService: ConfigService) {
    const node = configService.get<string>('ELASTICSEARCH_NODE');
    this.client = node ? new Client({ node }) : null;
    this.index =
      configService.get<string>('ORDER_AUDIT_INDEX') ?? DEFAULT_AUDIT_INDEX;
  }

  async logOrderEvent(
    eventType: OrderAuditEvent,
    data: unknown,
  ): Promise<void> {
    this.logger.log(`${eventType}: ${JSON.stringify(data)}`);
    if (!this.client) {
      return;
    }

    try {
      await this.client.index({
        index: this.index,
        document: {
          timestamp: new Date(),
          eventType,
          data,
        },
      });
    } catch (error) {
      this.logger.error(
        'Error logging to Elasticsearch',
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
