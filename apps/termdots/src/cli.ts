import { loadConfig } from './config.js';
import { createDecoder } from './decode/index.js';
import { colorTestLines } from './cli/color-test.js';
import { displayImage } from './cli/display.js';
import { usage } from './cli/usage.js';

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadConfig(argv.slice(2), env);

  if (config.help) {
    console.log(usage());
    return;
  }

  if (config.test) {
    for (const line of colorTestLines()) {
      console.log(line);
    }
    return;
  }

  if (!config.image) {
    console.log(usage());
    return;
  }

  await displayImage(config.image, createDecoder(config), config);
}
