// Lifecycle of one observed request
export type ResponseState = 'submitted' | 'status-received' | 'completed' | 'failed';

// Write endpoint answers 204 (or 200 on older servers) when points are accepted
export function isWriteSuccess(status: number): boolean {
  return status === 200 || status === 204;
}

// Extract a printable message from anything thrown by the transport
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps network errors, the useful detail is in the cause
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

// Observes a single in-flight request and turns its outcome into a boolean
// Failures end in a warning log line; observe() never rejects
export class ResponseClassifier {
  private state: ResponseState = 'submitted';

  constructor(private readonly uri: string) {}

  getState(): ResponseState {
    return this.state;
  }

  async observe(pending: Promise<Response>): Promise<boolean> {
    let response: Response;
    try {
      response = await pending;
    } catch (error) {
      // Connection refused, DNS failure, aborted request...
      this.state = 'failed';
      console.warn(`Cannot establish connection to InfluxDB: ${describeError(error)}`);
      return false;
    }

    this.state = 'status-received';
    const success = isWriteSuccess(response.status);
    if (!success) {
      console.warn(
        `Unexpected response status from InfluxDB '${response.status}' - '${response.statusText}' Uri: ${this.uri}`
      );
    }

    // Response body is not needed for writes, release the connection
    if (response.body !== null && !response.bodyUsed) {
      await response.body.cancel().catch((error: unknown) => {
        console.debug(`Failed to discard InfluxDB response body: ${describeError(error)}`);
      });
    }

    this.state = success ? 'completed' : 'failed';
    return success;
  }
}
