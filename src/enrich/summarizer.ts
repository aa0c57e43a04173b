import { InvokeEndpointCommand, SageMakerRuntimeClient } from '@aws-sdk/client-sagemaker-runtime';
import { z } from 'zod';
import { errorMessage, ModelUnavailableError, SummarizationError } from '../errors.js';

export interface Summarizer {
  summarize(text: string): Promise<string>;
}

export type EndpointInvoker = (endpointName: string, body: Uint8Array) => Promise<Uint8Array | undefined>;

export function sageMakerInvoker(region: string, client = new SageMakerRuntimeClient({ region })): EndpointInvoker {
  return async (endpointName, body) => {
    const res = await client.send(
      new InvokeEndpointCommand({
        EndpointName: endpointName,
        ContentType: 'application/x-text',
        Body: body
      })
    );
    return res.Body;
  };
}

const summaryResponseSchema = z.object({ summary_text: z.string() });

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/**
 * Summarizes text through a hosted summarization endpoint. A `ModelError`
 * from the service means the endpoint has to be relaunched, so it is raised
 * as `ModelUnavailableError`; every other failure is a `SummarizationError`.
 */
export class EndpointSummarizer implements Summarizer {
  constructor(
    private readonly endpointName: string,
    private readonly invoke: EndpointInvoker
  ) {}

  async summarize(text: string): Promise<string> {
    let body: Uint8Array | undefined;
    try {
      body = await this.invoke(this.endpointName, encoder.encode(text));
    } catch (error) {
      if (error instanceof Error && error.name === 'ModelError') {
        throw new ModelUnavailableError(this.endpointName, error);
      }
      throw new SummarizationError(`Endpoint "${this.endpointName}" failed: ${errorMessage(error)}`, error);
    }

    if (!body) {
      throw new SummarizationError(`Endpoint "${this.endpointName}" returned an empty response`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(decoder.decode(body));
    } catch (error) {
      throw new SummarizationError(`Endpoint "${this.endpointName}" returned invalid JSON`, error);
    }

    const parsed = summaryResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SummarizationError(`Endpoint "${this.endpointName}" response has no summary_text`);
    }
    return parsed.data.summary_text;
  }
}
