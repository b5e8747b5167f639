export const QUIZ_QUESTION_COUNT = 4;
export const OPTIONS_PER_QUESTION = 4;
export const MAX_ATTEMPTS_PER_SLOT = 10;
