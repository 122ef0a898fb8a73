// src/instrumentation.ts
import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { EnvVar } from '@/common/enum';
import { isPresent } from '@/utils/misc';

let sdk: NodeSDK | undefined;

/**
 * Starts OpenTelemetry export to Langfuse when all three Langfuse variables
 * are set. Must run before the graphs are built so their spans are captured.
 */
export function startTracing(
  env: Record<string, string | undefined> = process.env
): boolean {
  if (sdk) {
    return true;
  }
  const secretKey = env[EnvVar.LANGFUSE_SECRET_KEY];
  const publicKey = env[EnvVar.LANGFUSE_PUBLIC_KEY];
  const baseUrl = env[EnvVar.LANGFUSE_BASE_URL];
  if (!isPresent(secretKey) || !isPresent(publicKey) || !isPresent(baseUrl)) {
    return false;
  }

  sdk = new NodeSDK({
    spanProcessors: [
      new LangfuseSpanProcessor({ secretKey, publicKey, baseUrl }),
    ],
  });
  sdk.start();
  return true;
}

/** Flushes pending spans; a no-op when tracing never started */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) {
    return;
  }
  const current = sdk;
  sdk = undefined;
  await current.shutdown();
}
