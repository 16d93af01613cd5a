import { Agent, fetch } from 'undici';
import type { ChatPayload } from './chatCompletion';

const ERROR_BODY_EXCERPT = 500;

export interface TransportRequest {
  endpointUrl: string;
  payload: ChatPayload;
  credential: string;
  tlsVerify: boolean;
  signal: AbortSignal;
}

/** Sends one prompt to one provider. Must stop work when `signal` aborts. */
export interface HttpTransport {
  send(request: TransportRequest): Promise<unknown>;
}

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly bodyExcerpt: string
  ) {
    super(`Provider responded with HTTP ${status}${bodyExcerpt ? `: ${bodyExcerpt}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

export class FetchTransport implements HttpTransport {
  private verifyingAgent: Agent | null = null;
  private insecureAgent: Agent | null = null;

  private agentFor(tlsVerify: boolean): Agent {
    if (tlsVerify) {
      if (!this.verifyingAgent) {
        this.verifyingAgent = new Agent();
      }
      return this.verifyingAgent;
    }
    if (!this.insecureAgent) {
      this.insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureAgent;
  }

  async send(request: TransportRequest): Promise<unknown> {
    const response = await fetch(request.endpointUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${request.credential}`,
        'Content-Type': 'application/json',
        Accept: 'application/json'
      },
      body: JSON.stringify(request.payload),
      signal: request.signal,
      dispatcher: this.agentFor(request.tlsVerify)
    });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpStatusError(response.status, body.slice(0, ERROR_BODY_EXCERPT).trim());
    }

    return response.json();
  }

  async close(): Promise<void> {
    const agents = [this.verifyingAgent, this.insecureAgent].filter((agent): agent is Agent => agent !== null);
    this.verifyingAgent = null;
    this.insecureAgent = null;
    await Promise.all(agents.map((agent) => agent.close()));
  }
}
