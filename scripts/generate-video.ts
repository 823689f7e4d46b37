import { loadEnvFiles, readServerConfig } from '../server/config';
import { buildErrorResponse, buildGenerateVideoResponse } from '../server/handlers/generateVideoResponse';
import { parseGenerateVideoBody } from '../server/handlers/generateVideoRequest';
import { buildPipeline } from '../server/pipeline';

// Usage: npm run generate -- "a paper boat drifting down a rainy street" [16:9|9:16|1:1|4:3] [--no-enhance]
async function run() {
  const args = process.argv.slice(2);
  const enhance = !args.includes('--no-enhance');
  const [prompt, aspectRatio] = args.filter((a) => !a.startsWith('--'));

  const parsed = parseGenerateVideoBody({ prompt, aspect_ratio: aspectRatio, enhance_prompt: enhance });
  if (!parsed.ok) {
    console.error(`Invalid input: ${parsed.error}`);
    process.exitCode = 2;
    return;
  }

  loadEnvFiles();
  const { orchestrator } = buildPipeline(readServerConfig());

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

  console.log('This may take several minutes...');
  try {
    const result = await orchestrator.generate(parsed.value, { signal: controller.signal });
    console.log(JSON.stringify(buildGenerateVideoResponse(result, parsed.value.enhance), null, 2));
  } catch (err) {
    const { status, body } = buildErrorResponse(err);
    console.error(JSON.stringify(body, null, 2));
    process.exitCode = status === 400 ? 2 : 1;
  }
}

run().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
