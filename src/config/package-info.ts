import { z } from 'zod';
import packageJson from '../../package.json';

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

export const PACKAGE_INFO = PACKAGE_JSON_SCHEMA.parse(packageJson);
