import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src';

export default defineConfig(defineBaseConfig());
