import { isBulletLine, splitLines, stripBullet } from "./entries";

const MIN_SUMMARY_LINE_LENGTH = 20;
const MIN_ACHIEVEMENT_LENGTH = 10;

export function extractSummary(text: string): string {
  return splitLines(text)
    .filter((line) => !isBulletLine(line) && line.length > MIN_SUMMARY_LINE_LENGTH)
    .join(" ");
}

export function extractAchievements(text: string): string[] {
  const achievements: string[] = [];
  for (const line of splitLines(text)) {
    if (isBulletLine(line)) {
      const item = stripBullet(line);
      if (item) {
        achievements.push(item);
      }
    } else if (line.length > MIN_ACHIEVEMENT_LENGTH) {
      achievements.push(line);
    }
  }
  return achievements;
}
