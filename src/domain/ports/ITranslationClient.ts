import { TranslationRequest, TranslationResult } from '../entities/Translation';

/**
 * The pipeline's view of the translation capability: validated, retried,
 * with errors normalized to the TranslationError taxonomy.
 */
export interface ITranslationClient {
    translate(request: TranslationRequest): Promise<TranslationResult>;
}
