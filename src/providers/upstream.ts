import { v4 as uuidv4 } from "uuid";

export interface ChatMessage {
  role: string;
  content: string;
}

export interface ChatRequest {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean;
  temperature?: number;
  max_tokens?: number;
}

export interface SignInResponse {
  status: number;
  body: unknown;
}

/**
 * The calls the proxy makes against the third-party chat service.
 * Implementations throw on network errors and timeouts; HTTP error statuses
 * are returned, not thrown.
 */
export interface Upstream {
  /** Minimal chat request used as a liveness probe. Resolves with the HTTP status. */
  probe(token: string, signal: AbortSignal): Promise<number>;
  signIn(email: string, password: string, signal: AbortSignal): Promise<SignInResponse>;
  chatCompletion(token: string, request: ChatRequest, signal: AbortSignal): Promise<Response>;
}

export interface UpstreamOptions {
  baseUrl: string;
  model: string;
  modelName: string;
}

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36";

export class ChatUpstream implements Upstream {
  constructor(private readonly options: UpstreamOptions) {}

  private headers(token?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      "User-Agent": USER_AGENT,
      Origin: this.options.baseUrl,
    };
    if (token) headers.Authorization = `Bearer ${token}`;
    return headers;
  }

  private buildPayload(messages: ChatMessage[], stream: boolean, extra: Partial<ChatRequest> = {}) {
    return {
      stream,
      model: this.options.model,
      messages,
      ...(extra.temperature !== undefined ? { temperature: extra.temperature } : {}),
      ...(extra.max_tokens !== undefined ? { max_tokens: extra.max_tokens } : {}),
      chat_id: uuidv4(),
      id: uuidv4(),
      background_tasks: { title_generation: false, tags_generation: false },
      features: {
        image_generation: false,
        code_interpreter: false,
        web_search: false,
        auto_web_search: false,
      },
      model_item: { id: this.options.model, name: this.options.modelName, owned_by: "openai" },
      params: {},
      mcp_servers: [],
      tool_servers: [],
    };
  }

  async probe(token: string, signal: AbortSignal): Promise<number> {
    const res = await fetch(`${this.options.baseUrl}/api/chat/completions`, {
      method: "POST",
      headers: this.headers(token),
      body: JSON.stringify(this.buildPayload([{ role: "user", content: "hi" }], true)),
      signal,
    });
    // Only the status matters; release the connection
    await res.body?.cancel();
    return res.status;
  }

  async signIn(email: string, password: string, signal: AbortSignal): Promise<SignInResponse> {
    const res = await fetch(`${this.options.baseUrl}/api/v1/auths/signin`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({ email, password }),
      signal,
    });

    let body: unknown = null;
    try {
      body = await res.json();
    } catch {
      body = null;
    }
    return { status: res.status, body };
  }

  async chatCompletion(token: string, request: ChatRequest, signal: AbortSignal): Promise<Response> {
    return fetch(`${this.options.baseUrl}/api/chat/completions`, {
      method: "POST",
      headers: this.headers(token),
      body: JSON.stringify(this.buildPayload(request.messages, request.stream ?? false, request)),
      signal,
    });
  }
}
