import { registerNodeRuntime } from '../src/runtime.js';

registerNodeRuntime();
