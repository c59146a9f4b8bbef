import { z } from 'zod'
import { TRAIT_NAMES } from '../core/types.js'
import type {
  AgentContract,
  AgentTraits,
  RenderedPrompt,
  TraitBand,
  TraitDirective,
  TraitName,
} from '../core/types.js'
import rawDirectiveTable from './trait-directives.json' with { type: 'json' }

const traitNameSchema = z.enum(TRAIT_NAMES)
const bandSchema = z.enum(['low', 'moderate', 'high', 'very_high'])
const linesSchema = z.array(z.string().min(1)).min(1)

const conditionSchema = z.object({
  trait: traitNameSchema,
  gte: z.number().optional(),
  lt: z.number().optional(),
})

const ruleSchema = z.object({
  when: z.array(conditionSchema).min(1),
  text: z.string().min(1),
})

const directiveTableSchema = z.object({
  bands: z.array(z.object({
    band: bandSchema,
    min: z.number().int().min(0).max(100),
    label: z.string().min(1),
  })).min(1),
  summary: z.object({
    dominantAbove: z.number(),
    subduedBelow: z.number(),
  }),
  sections: z.array(z.object({
    title: z.string().min(1),
    traits: z.array(traitNameSchema).min(1),
  })),
  traits: z.record(z.string(), z.object({
    label: z.string().min(1),
    very_high: linesSchema,
    high: linesSchema,
    moderate: linesSchema,
    low: linesSchema,
  })),
  guidelines: z.array(z.object({
    context: z.string().min(1),
    label: z.string().min(1),
    rules: z.array(ruleSchema),
    fallback: z.string().min(1),
    additions: z.array(ruleSchema),
  })),
  capabilities: z.object({
    voice_enabled: z.string().min(1),
    tools_enabled: z.string().min(1),
  }),
}).superRefine((table, ctx) => {
  const seen = new Set<TraitName>()
  for (const section of table.sections) {
    for (const trait of section.traits) {
      if (seen.has(trait)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sections'], message: `Trait ${trait} appears in more than one section` })
      }
      seen.add(trait)
    }
  }
  for (const name of TRAIT_NAMES) {
    if (!seen.has(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sections'], message: `Trait ${name} is not assigned to a section` })
    }
    if (!(name in table.traits)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['traits', name], message: `Missing directives for trait ${name}` })
    }
  }
  const mins = table.bands.map(b => b.min)
  if (mins.some((m, i) => i > 0 && m >= mins[i - 1]) || mins[mins.length - 1] !== 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bands'], message: 'Bands must be ordered by descending minimum and end at 0' })
  }
})

export type DirectiveTable = z.infer<typeof directiveTableSchema>

const directivesSchema = z.array(z.object({
  trait: traitNameSchema,
  label: z.string(),
  value: z.number(),
  band: bandSchema,
  instructions: z.array(z.string()),
}))

/** Reads directives back from their cached JSON form; null when the text is not a directive list. */
export function parseDirectives(json: string): TraitDirective[] | null {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch {
    return null
  }
  const result = directivesSchema.safeParse(value)
  return result.success ? result.data : null
}

type GuidelineRule = z.infer<typeof ruleSchema>

export function parseDirectiveTable(raw: unknown): DirectiveTable {
  const result = directiveTableSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid trait directive table:\n  - ${issues.join('\n  - ')}`)
  }
  return result.data
}

export interface TraitSummary {
  dominant: TraitName[]
  subdued: TraitName[]
}

export interface InteractionGuideline {
  context: string
  label: string
  text: string
}

/**
 * Turns a contract's numeric traits into behavioural directives and a system
 * prompt. Pure: the same contract always renders byte-identical output.
 */
export class TraitModulator {
  private table: DirectiveTable

  constructor(table: DirectiveTable = parseDirectiveTable(rawDirectiveTable)) {
    this.table = table
  }

  band(value: number): { band: TraitBand; label: string } {
    for (const entry of this.table.bands) {
      if (value >= entry.min) {
        return { band: entry.band, label: entry.label }
      }
    }
    const last = this.table.bands[this.table.bands.length - 1]
    return { band: last.band, label: last.label }
  }

  directive(trait: TraitName, value: number): TraitDirective {
    const policy = this.table.traits[trait]
    const { band } = this.band(value)
    return {
      trait,
      label: policy.label,
      value,
      band,
      instructions: [...policy[band]],
    }
  }

  directives(traits: AgentTraits): TraitDirective[] {
    return this.table.sections.flatMap(section =>
      section.traits.map(trait => this.directive(trait, traits[trait])),
    )
  }

  summary(traits: AgentTraits): TraitSummary {
    return {
      dominant: TRAIT_NAMES.filter(name => traits[name] > this.table.summary.dominantAbove),
      subdued: TRAIT_NAMES.filter(name => traits[name] < this.table.summary.subduedBelow),
    }
  }

  guidelines(traits: AgentTraits): InteractionGuideline[] {
    return this.table.guidelines.map(guideline => {
      const matched = guideline.rules.find(rule => matches(rule, traits))
      const parts = [matched ? matched.text : guideline.fallback]
      for (const addition of guideline.additions) {
        if (matches(addition, traits)) parts.push(addition.text)
      }
      return { context: guideline.context, label: guideline.label, text: parts.join('. ') }
    })
  }

  render(contract: AgentContract): RenderedPrompt {
    const directives = this.directives(contract.traits)
    const blocks: string[] = []

    const description = contract.identity.short_description.replace(/[.\s]+$/, '')
    blocks.push(`You are ${contract.name}, ${description}.`)

    const identity = [
      contract.identity.character_role && `Role: ${contract.identity.character_role}`,
      contract.identity.mission && `Mission: ${contract.identity.mission}`,
      contract.identity.interaction_style && `Interaction style: ${contract.identity.interaction_style}`,
      contract.identity.full_description,
    ].filter((line): line is string => Boolean(line))
    if (identity.length > 0) {
      blocks.push(['## IDENTITY', ...identity].join('\n'))
    }

    blocks.push(['## TRAIT PROFILE', ...this.summaryLines(contract.traits)].join('\n'))

    const byTrait = new Map(directives.map(d => [d.trait, d]))
    for (const section of this.table.sections) {
      const body = section.traits.flatMap(trait => {
        const d = byTrait.get(trait)
        if (!d) return []
        return [`**${d.label} (${this.band(d.value).label}, ${d.value}):**`, ...d.instructions.map(i => `- ${i}`), '']
      })
      blocks.push([`## ${section.title}`, '', ...body].join('\n').trimEnd())
    }

    const guidelines = this.guidelines(contract.traits).map(g => `- ${g.label}: ${g.text}`)
    blocks.push(['## INTERACTION GUIDELINES', ...guidelines].join('\n'))

    const capabilities: string[] = []
    if (contract.configuration.voice_enabled) capabilities.push(`- ${this.table.capabilities.voice_enabled}`)
    if (contract.configuration.tools_enabled) capabilities.push(`- ${this.table.capabilities.tools_enabled}`)
    if (capabilities.length > 0) {
      blocks.push(['## CAPABILITIES', ...capabilities].join('\n'))
    }

    return { system_prompt: blocks.join('\n\n'), directives }
  }

  private summaryLines(traits: AgentTraits): string[] {
    const { dominant, subdued } = this.summary(traits)
    const labels = (names: TraitName[]) => names.map(n => this.table.traits[n].label).join(', ')
    const lines: string[] = []
    if (dominant.length > 0) lines.push(`Dominant traits: ${labels(dominant)}`)
    if (subdued.length > 0) lines.push(`Subdued traits: ${labels(subdued)}`)
    return lines.length > 0 ? lines : ['Balanced trait profile']
  }
}

function matches(rule: GuidelineRule, traits: AgentTraits): boolean {
  return rule.when.every(c =>
    (c.gte === undefined || traits[c.trait] >= c.gte) && (c.lt === undefined || traits[c.trait] < c.lt),
  )
}
