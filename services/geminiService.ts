import { GoogleGenAI } from "@google/genai";
import { type AppConfig, ConfigurationError } from "./config";

/** Text prompt in, text out. The planner only ever talks to the model through this. */
export interface AdvisoryModel {
    readonly modelName: string;
    generate(prompt: string): Promise<string>;
}

const GENERATE_CONTENT = 'generateContent';

const matchesConfigured = (name: string, configured: string) =>
    name === configured || name === `models/${configured}`;

// Prefer the configured model; otherwise take the first one the key can call generateContent on.
const resolveModelName = async (ai: GoogleGenAI, configured: string): Promise<string> => {
    let firstUsable: string | undefined;
    try {
        const pager = await ai.models.list();
        for await (const model of pager) {
            if (!model.name || !model.supportedActions?.includes(GENERATE_CONTENT)) continue;
            if (matchesConfigured(model.name, configured)) return model.name;
            firstUsable ??= model.name;
        }
    } catch (error) {
        console.error("Gemini Model Listing Error:", error);
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Could not load Gemini models: ${reason}`);
    }

    if (!firstUsable) {
        throw new ConfigurationError("No Gemini model with generateContent found for your API key. Check Google AI Studio.");
    }
    console.warn(`Model ${configured} is not available for this key, using ${firstUsable}.`);
    return firstUsable;
};

export const createGeminiAdvisor = async (config: AppConfig): Promise<AdvisoryModel> => {
    const ai = new GoogleGenAI({ apiKey: config.apiKey });
    const modelName = await resolveModelName(ai, config.model);

    return {
        modelName,
        generate: async (prompt: string) => {
            const response = await ai.models.generateContent({
                model: modelName,
                contents: prompt,
            });
            return response.text ?? "";
        },
    };
};
