/**
 * Structured-generation request sent to the external reasoning service.
 * The service returns raw text that is expected to conform to `responseSchema`.
 */
export interface ReasoningRequest {
  system: string;
  prompt: string;
  /** JSON Schema document describing the required response shape */
  responseSchema: object;
}

/**
 * Port for the LLM client. Network and timeout failures reject the promise;
 * the generator treats any rejection as a generation failure.
 */
export interface IReasoningService {
  generate(request: ReasoningRequest): Promise<string>;
}
