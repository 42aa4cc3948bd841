/**
 * Picks the LLM client named by LLM_PROVIDER.
 */

import { AppSettings } from '../config/settings';
import { CloudLLMClient } from './cloudClient';
import { ILLMClient } from './llmClient';
import { OllamaClient } from './ollamaClient';

export function createLLMClient(settings: AppSettings): ILLMClient {
    const sampling = {
        temperature: settings.temperature,
        topP: settings.topP,
        maxTokens: settings.maxTokens,
    };

    if (settings.llmProvider === 'cloud') {
        return new CloudLLMClient({
            apiKey: settings.cloudApiKey,
            baseUrl: settings.cloudBaseUrl,
            model: settings.cloudModel,
            timeoutMs: settings.llmTimeoutMs,
            sampling,
        });
    }

    return new OllamaClient({
        baseUrl: settings.ollamaBaseUrl,
        model: settings.ollamaModel,
        useChatApi: settings.ollamaUseChatApi,
        timeoutMs: settings.llmTimeoutMs,
        sampling,
    });
}
