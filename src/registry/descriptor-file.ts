import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AgentDescriptorSchema } from '../types/index.js';
import type { AgentDescriptor } from '../types/index.js';
import { ValidationError, formatZodError } from '../errors/index.js';

const DescriptorsFileSchema = z.array(AgentDescriptorSchema).superRefine((agents, ctx) => {
  const seen = new Set<string>();
  agents.forEach((a, i) => {
    if (seen.has(a.id)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'id'], message: `duplicate agent id "${a.id}"` });
    seen.add(a.id);
  });
});

export function parseDescriptors(data: unknown): AgentDescriptor[] {
  const parsed = DescriptorsFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ValidationError(`Agent descriptors are invalid: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/** Read the agent descriptors a registry is bootstrapped from. */
export async function loadDescriptorFile(path: string): Promise<AgentDescriptor[]> {
  const raw = await readFile(path, 'utf-8');
  return parseDescriptors(JSON.parse(raw));
}
