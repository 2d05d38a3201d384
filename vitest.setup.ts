import { configureAgentLogger } from '@routegraph/agent-core';
import { configureInferenceLogger } from './packages/inference-adapter/src/logger';

configureAgentLogger({ consoleOutput: false });
configureInferenceLogger({ consoleOutput: false });
