import { ScheduleCourse } from '../../types/portal.types';

function mergeKey(course: ScheduleCourse): string {
  return JSON.stringify([
    course.name,
    course.weekday,
    course.startSlot,
    course.endSlot,
    course.teacher,
    course.location,
  ]);
}

/**
 * Collapse entries that share name, weekday, slots, teacher and location.
 * Weeks are unioned; distinct week labels are joined with ",".
 * Output keeps the order in which each group first appeared.
 */
export function mergeCourses(courses: ScheduleCourse[]): ScheduleCourse[] {
  const groups = new Map<string, { course: ScheduleCourse; weeks: Set<number>; labels: string[] }>();

  for (const course of courses) {
    const key = mergeKey(course);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, {
        course,
        weeks: new Set(course.weeks),
        labels: course.weekRange ? [course.weekRange] : [],
      });
      continue;
    }
    course.weeks.forEach(week => group.weeks.add(week));
    if (course.weekRange && !group.labels.includes(course.weekRange)) {
      group.labels.push(course.weekRange);
    }
  }

  return [...groups.values()].map(({ course, weeks, labels }) => ({
    ...course,
    weekRange: labels.join(','),
    weeks: [...weeks].sort((a, b) => a - b),
  }));
}
