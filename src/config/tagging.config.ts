import { registerAs } from '@nestjs/config';
import * as path from 'node:path';

export default registerAs('tagging', () => ({
  configPath: path.resolve(
    process.env.TAG_PREFIX_CONFIG_PATH || path.join(process.cwd(), 'tag-prefixes.json'),
  ),
}));
