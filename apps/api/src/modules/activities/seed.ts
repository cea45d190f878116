import type { ActivityCatalog } from '@mergington/types';

/**
 * Activities offered at Mergington High School when the server starts.
 */
const SEED_ACTIVITIES: ActivityCatalog = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  'Soccer Team': {
    description: 'Practice drills and play matches against other schools',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 5:30 PM',
    max_participants: 22,
    participants: ['liam@mergington.edu', 'noah@mergington.edu'],
  },
  'Basketball Team': {
    description: 'Train fundamentals and compete in the district league',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    max_participants: 15,
    participants: ['ava@mergington.edu', 'mia@mergington.edu'],
  },
  'Art Club': {
    description: 'Explore painting, drawing and mixed media projects',
    schedule: 'Wednesdays, 3:30 PM - 5:00 PM',
    max_participants: 18,
    participants: ['amelia@mergington.edu', 'harper@mergington.edu'],
  },
  'Drama Club': {
    description: 'Rehearse and perform plays for the school community',
    schedule: 'Thursdays, 3:30 PM - 5:30 PM',
    max_participants: 20,
    participants: ['ella@mergington.edu', 'scarlett@mergington.edu'],
  },
  'Math Club': {
    description: 'Solve challenging problems and prepare for math competitions',
    schedule: 'Tuesdays, 3:30 PM - 4:30 PM',
    max_participants: 10,
    participants: ['james@mergington.edu', 'benjamin@mergington.edu'],
  },
  'Debate Team': {
    description: 'Build public speaking skills and compete in debate tournaments',
    schedule: 'Fridays, 4:00 PM - 5:30 PM',
    max_participants: 12,
    participants: ['charlotte@mergington.edu', 'henry@mergington.edu'],
  },
  'Science Club': {
    description: 'Run hands-on experiments and prepare for the science fair',
    schedule: 'Mondays, 3:30 PM - 4:30 PM',
    max_participants: 16,
    participants: ['lucas@mergington.edu', 'grace@mergington.edu'],
  },
};

export const SEED_ACTIVITY_NAMES = Object.keys(SEED_ACTIVITIES);

/**
 * Fresh copy of the seed catalog. Each call returns independent records so
 * that mutating one directory never leaks into another.
 */
export function createSeedActivities(): ActivityCatalog {
  return structuredClone(SEED_ACTIVITIES);
}
