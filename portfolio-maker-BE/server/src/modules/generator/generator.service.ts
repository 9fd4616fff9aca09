import type {
  CoverLetterRequestSchema,
  GenerationResponseData,
  PortfolioAnalysisRequestSchema,
  ResumeRequestSchema,
} from '@shared/types'
import { logger } from '../../logger'
import { getInferenceClient, type InferenceClient } from './ai/inference-client'
import {
  buildCoverLetterPrompt,
  buildPortfolioAnalysisPrompt,
  buildResumePrompt,
  buildSkillEnhancerPrompt,
  type AssembledPrompt,
  type PromptKind,
} from './prompts'

export class GeneratorService {
  private log = logger.child({ module: 'GeneratorService' })

  constructor(private readonly client: InferenceClient = getInferenceClient()) {}

  generateResume(request: ResumeRequestSchema): Promise<GenerationResponseData> {
    return this.run('resume_writer', buildResumePrompt(request.profile, request.links, request.options))
  }

  generateCoverLetter(request: CoverLetterRequestSchema): Promise<GenerationResponseData> {
    return this.run(
      'cover_letter',
      buildCoverLetterPrompt(request.profile, {
        companyName: request.companyName.trim(),
        hiringManager: request.hiringManager.trim(),
        jobTitle: request.jobTitle.trim(),
        jobDescription: request.jobDescription.trim(),
        tone: request.tone,
        length: request.length,
      })
    )
  }

  analyzePortfolio(request: PortfolioAnalysisRequestSchema): Promise<GenerationResponseData> {
    return this.run('portfolio_analyzer', buildPortfolioAnalysisPrompt(request.profile, request.links))
  }

  enhanceContent(originalContent: string): Promise<GenerationResponseData> {
    return this.run('skill_enhancer', buildSkillEnhancerPrompt(originalContent))
  }

  private async run(kind: PromptKind, prompt: AssembledPrompt): Promise<GenerationResponseData> {
    const started = Date.now()
    const result = await this.client.generate(prompt.systemPrompt, prompt.userPrompt)
    this.log.info({ kind, outcome: result.outcome, durationMs: Date.now() - started }, 'Generation finished')
    return result
  }
}

let generatorService: GeneratorService | null = null

export function getGeneratorService(): GeneratorService {
  if (!generatorService) {
    generatorService = new GeneratorService()
  }
  return generatorService
}
