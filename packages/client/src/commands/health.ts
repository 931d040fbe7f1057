import { ApiError, type IApiService } from '../domain';

const mark = (ok: boolean) => (ok ? '✅' : '❌');

export async function healthCommand(api: IApiService): Promise<number> {
  const status = await api.checkHealth();
  if (!status.isOnline) {
    console.error('❌ Server is OFFLINE.');
    return 1;
  }
  console.log(`🟢 Server online (${status.latencyMs} ms)`);

  try {
    const deps = await api.getDependencies();
    console.log(`${mark(deps.ffmpeg)} ffmpeg`);
    console.log(`${mark(deps.apiKeyConfigured)} GEMINI_API_KEY`);
    console.log(`${mark(deps.transcriber)} transcriber`);
    return deps.ffmpeg && deps.apiKeyConfigured && deps.transcriber ? 0 : 1;
  } catch (error) {
    if (error instanceof ApiError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}
