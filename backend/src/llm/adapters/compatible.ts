/**
 * Compatible-mode Adapter
 *
 * Used when native translation is switched off: the backend's compatible
 * endpoint already speaks the standard protocol, so the validated request is
 * forwarded as-is and responses are relayed untouched.
 */

import type { ChatCompletionRequest } from '@agent-gateway/shared-types';
import { buildForwardHeaders } from './types.js';
import type { AdapterRequest, BuildRequestOptions, ProtocolAdapter } from './types.js';

export class CompatibleModeAdapter implements ProtocolAdapter {
  readonly mode = 'compatible' as const;

  constructor(private readonly opts: { endpoint: string; apiKey: string }) {}

  buildRequest(request: ChatCompletionRequest, options: BuildRequestOptions): AdapterRequest {
    return {
      url: this.opts.endpoint,
      headers: buildForwardHeaders(this.opts.apiKey, options),
      body: request,
    };
  }
}
