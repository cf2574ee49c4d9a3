import type { DailyLog, TrendSummary, User } from "../types";

export const TASK_DELIMITER = "|";

/**
 * The parser depends on this wording. Keep it in sync with parsePlanToRecommendations.
 */
export const OUTPUT_FORMAT_INSTRUCTION =
    "Respond ONLY with the tasks separated by a single pipe character (|). Do not number the tasks and do not add any other text.";

export const COACH_SYSTEM_PROMPT = `You are an expert fitness coach, nutritionist, and wellness advisor.
Your goal is to help users transform their lives through personalized fitness guidance,
nutrition advice, and healthy lifestyle recommendations. You have extensive knowledge of:
- Exercise physiology and workout programming
- Nutrition and dietary planning
- Behavior change psychology
- Injury prevention and recovery
- Wellness and stress management
Always provide evidence-based, safe, and personalized recommendations.`;

/**
 * Build the next-day planning prompt.
 * Same inputs always give the same string; nothing here reads the clock.
 */
export function composeNextDayPrompt(user: User, log: DailyLog, trend: TrendSummary): string {
    return `Based on today's activity log, the user's recent trend and profile, plan tomorrow.

User Profile:
- Age: ${user.age}
- Weight: ${user.weight}
- Height: ${user.height}
- Location: ${user.geography}

Today's Activity:
- Calories: ${log.calories}
- Activity Level: ${log.activityLevel}

7-Day Trend:
- Average Calories: ${Math.round(trend.averageCalories)}
- Average Activity Level: ${trend.averageActivity.toFixed(1)}

Generate 3-4 specific, actionable tasks for tomorrow.

Rules:
- Include at least one exercise task
- Include at least one nutrition task
- Every task must be achievable within 24 hours
- Keep each task to a single short sentence

${OUTPUT_FORMAT_INSTRUCTION}
Example: Walk 30 minutes after lunch${TASK_DELIMITER}Eat a portion of vegetables with dinner${TASK_DELIMITER}Drink 2 liters of water`;
}
