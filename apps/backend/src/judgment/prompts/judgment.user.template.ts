import { DIMENSION_CEILINGS, type Dimension } from '../dimensions';
import type { JudgmentRequest } from '../judgment-client.interface';

// Score bands per dimension, scaled to each ceiling
const SCORING_GUIDE: Record<Dimension, string[]> = {
  grammar: [
    '27-30: Few to no errors; varied sentence structures used correctly',
    '21-26: Minor errors that do not impede understanding',
    '15-20: Noticeable errors but meaning remains clear',
    '9-14: Frequent errors that occasionally obscure meaning',
    '0-8: Errors so frequent that meaning is often lost',
  ],
  vocabulary: [
    '27-30: Precise, varied and appropriate word choices for the level',
    '21-26: Generally appropriate with some variety',
    '15-20: Basic vocabulary with repetition or awkward choices',
    '9-14: Limited range, frequent inappropriate choices',
    '0-8: Very limited range, often confusing word usage',
  ],
  content: [
    '36-40: Fully answers the prompt; every requirement met; ideas well developed and organized',
    '28-35: Answers the prompt; most requirements met with adequate support',
    '20-27: Partly on task; ideas present but thin or loosely organized',
    '12-19: Drifts from the prompt; several requirements missing',
    '0-11: Off-topic or no clear ideas',
  ],
};

const FOCUS: Record<Dimension, string> = {
  grammar:
    'Grammar only: agreement, tense, articles, prepositions, sentence boundaries and punctuation. Ignore word choice and ideas.',
  vocabulary:
    'Vocabulary only: range, precision, collocations, word forms and repetition. Ignore grammar and ideas.',
  content:
    'Content only: relevance to the prompt, coverage of the requirements, use of the keywords, development and organization of ideas. Ignore language errors unless they hide meaning.',
};

export const buildJudgmentPrompt = ({ dimension, essayText, prompt, rubricGuidance }: JudgmentRequest) => {
  const ceiling = DIMENSION_CEILINGS[dimension];
  const assignment = [
    `Title: ${prompt.title}`,
    `Prompt: ${prompt.prompt}`,
    `Grade tier: ${prompt.gradeTier}`,
    `Proficiency level: ${prompt.level}`,
    prompt.requirements.length
      ? `Requirements:\n${prompt.requirements.map((item) => `- ${item}`).join('\n')}`
      : '',
    prompt.keywords.length ? `Keywords: ${prompt.keywords.join(', ')}` : '',
  ].filter(Boolean);

  const sections = [
    `DIMENSION: ${dimension} (score 0-${ceiling})`,
    FOCUS[dimension],
    '',
    'SCORING GUIDE:',
    ...SCORING_GUIDE[dimension].map((band) => `- ${band}`),
    '',
    'ASSIGNMENT:',
    ...assignment,
    '',
    ...(rubricGuidance ? ['NOTES FROM AUTOMATIC CHECKS:', rubricGuidance, ''] : []),
    'OUTPUT (JSON only, double quotes, no trailing commas):',
    `{"score": number 0-${ceiling}, "feedback": string (max 300 characters), "issues": string[] (max 10), "suggestions": string[] (max 5)}`,
    '',
    'ESSAY:',
    '"""',
    essayText,
    '"""',
  ];

  return sections.join('\n');
};
