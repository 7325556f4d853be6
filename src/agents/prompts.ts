export const DECOMPOSE_PROMPT = `# DECOMPOSE GOAL

You are a task planner. Break the goal below into at most {{maxTasks}} concrete tasks and state which tasks must finish before others can start.

## Goal
{{goal}}

## Output Format
Respond with a single JSON object and nothing else:

\`\`\`json
{
  "tasks": [
    { "id": 1, "description": "Collect the requirements", "dependencies": [] },
    { "id": 2, "description": "Draft the design", "dependencies": [1] }
  ]
}
\`\`\`

## Rules
- **ids**: integers, unique, starting at 1
- **dependencies**: ids of tasks that must be completed first; use [] for none
- **No cycles**: a task may not depend on itself, directly or through other tasks
- **Descriptions**: one specific, verifiable action per task
- Do not exceed {{maxTasks}} tasks`;

export function buildDecomposePrompt(goal: string, maxTasks: number): string {
  // Replacer functions keep `$` sequences in the goal literal
  return DECOMPOSE_PROMPT.replaceAll('{{maxTasks}}', () => String(maxTasks)).replace(
    '{{goal}}',
    () => goal
  );
}
