import type { ActivityMap } from './types.js';

export const MERGINGTON_ACTIVITIES: ActivityMap = {
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
    description: 'Train with the school team and play in the regional league',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    max_participants: 22,
    participants: ['alex@mergington.edu', 'lucas@mergington.edu'],
  },
  'Basketball Team': {
    description: 'Practice drills and compete against neighbouring schools',
    schedule: 'Wednesdays and Fridays, 3:30 PM - 5:00 PM',
    max_participants: 15,
    participants: ['mia@mergington.edu'],
  },
  'Art Club': {
    description: 'Explore drawing, painting and sculpture',
    schedule: 'Mondays, 3:30 PM - 5:00 PM',
    max_participants: 18,
    participants: ['ava@mergington.edu', 'noah@mergington.edu'],
  },
  'Drama Club': {
    description: 'Rehearse and stage the spring and winter productions',
    schedule: 'Thursdays, 3:30 PM - 5:30 PM',
    max_participants: 25,
    participants: ['isabella@mergington.edu'],
  },
  'Math Club': {
    description: 'Solve challenging problems and prepare for math competitions',
    schedule: 'Tuesdays, 3:30 PM - 4:30 PM',
    max_participants: 10,
    participants: ['ethan@mergington.edu', 'amelia@mergington.edu'],
  },
  'Debate Team': {
    description: 'Build argumentation skills and compete in debate tournaments',
    schedule: 'Wednesdays, 4:00 PM - 5:30 PM',
    max_participants: 16,
    participants: ['liam@mergington.edu'],
  },
};
