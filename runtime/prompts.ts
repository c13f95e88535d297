import { isPayloadObject, readString, type Payload, type PayloadValue } from '../agents/payload';
import { InvalidRequestError } from '../core/errors';
import type { MemoryRecord } from '../memory/types';
import type { AgentRole, AgentVariant } from './types';

const RESEARCH_TYPES: Record<string, string> = {
  general: 'Research this topic broadly, covering main aspects and current understanding.',
  technical: 'Focus on technical details, specifications, and implementation aspects.',
  factual: 'Verify facts and provide accurate, current information with sources when possible.',
  comparative: 'Compare different options, approaches, or solutions related to this topic.',
  trend: 'Research current trends, developments, and future predictions for this topic.'
};

const RESEARCH_DEPTHS: Record<string, string> = {
  light: 'Provide a brief overview with key points.',
  medium: 'Provide detailed information with multiple perspectives and examples.',
  deep: 'Provide comprehensive analysis with detailed explanations, comparisons, and implications.'
};

const SYNTHESIS_TYPES: Record<string, string> = {
  analysis: 'Analyze the information thoroughly, identifying patterns, relationships, and key insights.',
  summary: 'Provide a concise summary highlighting the most important points and conclusions.',
  comparison: 'Compare and contrast different viewpoints, approaches, or findings in the sources.',
  evaluation: 'Evaluate the quality, credibility, and implications of the information provided.',
  integration: 'Integrate information from all sources into a cohesive understanding.'
};

const SYNTHESIS_STYLES: Record<string, string> = {
  comprehensive: 'Provide detailed, thorough analysis covering all aspects.',
  concise: 'Focus on key points and essential information only.',
  academic: 'Use formal, academic tone with detailed reasoning.',
  practical: 'Focus on practical implications and actionable insights.'
};

export const researchVariant: AgentVariant = {
  role: 'research',
  systemInstruction: 'You are a thorough research assistant. Provide accurate, well-sourced information.',
  memoryTags: ['research', 'findings'],
  memoryQuery: (input) => requireText(input, ['query', 'topic']),
  buildPrompt: (input, memories) => {
    const query = requireText(input, ['query', 'topic']);
    const researchType = readString(input, 'research_type') ?? 'general';
    const depth = readString(input, 'depth') ?? 'medium';

    return [
      `Research Query: ${query}`,
      '',
      `Research Type: ${researchType}`,
      `Research Depth: ${depth}`,
      '',
      'Instructions:',
      `- ${RESEARCH_TYPES[researchType] ?? RESEARCH_TYPES.general}`,
      `- ${RESEARCH_DEPTHS[depth] ?? RESEARCH_DEPTHS.medium}`,
      '- Structure your response with clear sections',
      '- Cite sources as URLs or numbered references like [1]',
      '- Suggest related topics for further research',
      ...formatMemories(memories, 'Previous findings')
    ].join('\n');
  }
};

export const synthesisVariant: AgentVariant = {
  role: 'synthesis',
  systemInstruction: 'You are an expert analyst specializing in information synthesis. Provide comprehensive, well-structured analysis.',
  memoryTags: ['synthesis', 'analysis'],
  memoryQuery: (input) => requireText(input, ['topic', 'query']),
  buildPrompt: (input, memories) => {
    const topic = requireText(input, ['topic', 'query']);
    const synthesisType = readString(input, 'synthesis_type') ?? 'analysis';
    const style = readString(input, 'style') ?? 'comprehensive';
    const sources = formatSources(input.sources);

    return [
      `Topic: ${topic}`,
      '',
      `Synthesis Type: ${synthesisType}`,
      `Style: ${style}`,
      '',
      'Instructions:',
      `- ${SYNTHESIS_TYPES[synthesisType] ?? SYNTHESIS_TYPES.analysis}`,
      `- ${SYNTHESIS_STYLES[style] ?? SYNTHESIS_STYLES.comprehensive}`,
      ...(sources.length ? ['', 'Sources to Synthesize:', ...sources] : []),
      ...formatMemories(memories, 'Additional Context from Memory'),
      '',
      `Structure the synthesis of "${topic}" as: Executive Summary, Key Findings, Analysis, Conclusions, Confidence Assessment.`
    ].join('\n');
  }
};

export const generalVariant: AgentVariant = {
  role: 'general',
  systemInstruction: 'You are a helpful assistant. Answer precisely and cite sources where you can.',
  memoryTags: ['general'],
  memoryQuery: (input) => requireText(input, ['prompt', 'query', 'topic']),
  buildPrompt: (input, memories) => {
    const prompt = requireText(input, ['prompt', 'query', 'topic']);
    return [prompt, ...formatMemories(memories, 'Relevant context')].join('\n');
  }
};

const VARIANTS: Record<AgentRole, AgentVariant> = {
  research: researchVariant,
  synthesis: synthesisVariant,
  general: generalVariant
};

export function variantFor(role: AgentRole): AgentVariant {
  return VARIANTS[role];
}

function requireText(input: Readonly<Payload>, keys: string[]): string {
  for (const key of keys) {
    const value = readString(input, key)?.trim();
    if (value) {
      return value;
    }
  }
  throw new InvalidRequestError(`Task input requires one of: ${keys.join(', ')}`);
}

function formatMemories(memories: readonly MemoryRecord[], heading: string): string[] {
  if (!memories.length) {
    return [];
  }
  return ['', `${heading}:`, ...memories.map((memory, index) => `${index + 1}. ${memory.content}`)];
}

function formatSources(value: PayloadValue | undefined): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((source, index) => {
    if (isPayloadObject(source)) {
      const kind = readString(source, 'type') ?? 'unknown';
      const content = readString(source, 'content') ?? readString(source, 'text') ?? JSON.stringify(source);
      return `Source ${index + 1} (${kind}): ${content}`;
    }
    return `Source ${index + 1}: ${typeof source === 'string' ? source : JSON.stringify(source)}`;
  });
}
