import { fal } from '@fal-ai/client';
import { ServiceErrorCode, createServiceError, describeError, type Logger } from '@keyreel/core';

export interface FalSubscribeResult {
  output: unknown;
  /** The fal.ai request ID, useful for checking on a timed-out job. */
  requestId: string;
}

export interface FalSubscribeOptions {
  /** Polling interval in ms. Defaults by model family. */
  pollInterval?: number;
  /** Client-side timeout in ms. Defaults by model family. */
  timeout?: number;
  logger?: Partial<Logger>;
  /** Step or artifact label for log lines. */
  label?: string;
  signal?: AbortSignal;
}

/**
 * Subscribes to a fal.ai queue endpoint, capturing the request ID as soon as
 * the job is enqueued so that timeouts can name it.
 */
export async function falSubscribe(
  model: string,
  input: Record<string, unknown>,
  options: FalSubscribeOptions = {},
): Promise<FalSubscribeResult> {
  const {
    pollInterval = getPollIntervalForModel(model),
    timeout = getTimeoutForModel(model),
    logger,
    label,
    signal,
  } = options;

  let capturedRequestId: string | undefined;
  const startTime = Date.now();

  logger?.debug?.('providers.fal-ai.subscribe.start', {
    model,
    label,
    pollInterval,
    timeout,
    inputKeys: Object.keys(input),
  });

  const abortController = new AbortController();
  let timedOut = false;
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    abortController.abort();
  }, timeout);
  const forwardAbort = () => abortController.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const result = await fal.subscribe(model, {
      input,
      pollInterval,
      onEnqueue: (requestId) => {
        capturedRequestId = requestId;
        logger?.debug?.('providers.fal-ai.subscribe.enqueued', { model, label, requestId });
      },
      onQueueUpdate: (status) => {
        logger?.debug?.('providers.fal-ai.subscribe.queueUpdate', {
          model,
          label,
          requestId: capturedRequestId,
          status: status.status,
          elapsedMs: Date.now() - startTime,
        });
      },
      abortSignal: abortController.signal,
    });

    const requestId = result.requestId || capturedRequestId;
    if (!requestId) {
      throw createServiceError(
        ServiceErrorCode.MALFORMED_RESPONSE,
        `fal.ai subscribe completed without requestId for model ${model}.`,
      );
    }

    logger?.debug?.('providers.fal-ai.subscribe.completed', {
      model,
      label,
      requestId,
      elapsedMs: Date.now() - startTime,
    });

    return { output: result.data, requestId };
  } catch (error) {
    const elapsed = Date.now() - startTime;
    if (timedOut) {
      logger?.warn?.('providers.fal-ai.subscribe.timeout', {
        model,
        label,
        requestId: capturedRequestId,
        timeoutMs: timeout,
        elapsedMs: elapsed,
      });
      throw createServiceError(
        ServiceErrorCode.REQUEST_FAILED,
        `fal.ai request timed out after ${elapsed}ms.`,
        {
          cause: error,
          context: capturedRequestId ? `request ${capturedRequestId}` : `model ${model}`,
          suggestion: 'The job may still complete on fal.ai; check it by request ID.',
        },
      );
    }
    throw createServiceError(ServiceErrorCode.REQUEST_FAILED, `fal.ai request failed: ${describeError(error)}`, {
      cause: error,
      context: capturedRequestId ? `request ${capturedRequestId}` : `model ${model}`,
    });
  } finally {
    clearTimeout(timeoutHandle);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

const VIDEO_MARKERS = ['kling', 'runway', 'video', 'minimax', 'luma'];
const IMAGE_MARKERS = ['flux', 'sdxl', 'stable-diffusion', 'kontext'];

function matches(model: string, markers: string[]): boolean {
  const normalized = model.toLowerCase();
  return markers.some((marker) => normalized.includes(marker));
}

/**
 * Video models take minutes, so they are polled less often.
 */
export function getPollIntervalForModel(model: string): number {
  if (matches(model, VIDEO_MARKERS)) {
    return 5000;
  }
  if (matches(model, IMAGE_MARKERS)) {
    return 2000;
  }
  return 3000;
}

export function getTimeoutForModel(model: string): number {
  if (matches(model, VIDEO_MARKERS)) {
    return 15 * 60 * 1000;
  }
  if (matches(model, IMAGE_MARKERS)) {
    return 5 * 60 * 1000;
  }
  return 10 * 60 * 1000;
}
