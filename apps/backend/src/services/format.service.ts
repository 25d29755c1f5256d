import type { Logger } from '@agentic-retail/logger';
import { formatSearchResponse } from '@agentic-retail/formatter';
import type { FormatRequest, FormattedSearchResponse } from '@agentic-retail/shared';

export class FormatService {
  constructor(private readonly logger: Logger) {}

  format(request: FormatRequest): FormattedSearchResponse {
    return formatSearchResponse(request.searchType, request.rawResponse, request.query, {
      logger: this.logger,
      ...(request.processingTimeMs === undefined ? {} : { processingTimeMs: request.processingTimeMs }),
    });
  }
}
