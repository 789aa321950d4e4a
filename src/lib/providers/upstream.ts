/**
 * Downstream generation. Only reached after the gate allows a request.
 */
export interface UpstreamLlm {
  complete(prompt: string): Promise<string>;
}

/**
 * Stand-in model that echoes the prompt; used until a real provider is wired.
 */
export class EchoUpstream implements UpstreamLlm {
  async complete(prompt: string): Promise<string> {
    return `Echo: ${prompt}`;
  }
}
