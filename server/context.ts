import type { GenerationClient, GenerationOptions } from "./llm";
import type { ActivityStore } from "./store";

/**
 * Dependencies every service handler receives, passed explicitly per call
 */
export interface ServiceContext {
    store: ActivityStore;
    generator: GenerationClient;
    generation: GenerationOptions;
    now: () => Date;
}
