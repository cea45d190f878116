/**
 * Activities API Tests
 *
 * Drives the signup and unregister endpoints through Fastify's inject(),
 * with a fresh seed directory for every test.
 */

import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ActivityDirectory } from '../src/modules/activities/directory';
import { SEED_ACTIVITY_NAMES } from '../src/modules/activities/seed';

import { buildTestServer } from './helpers/server';

function participantsOf(app: FastifyInstance, activityName: string): string[] {
  const activity = app.activities.get(activityName);
  if (!activity) {
    throw new Error(`missing fixture activity ${activityName}`);
  }
  return activity.participants;
}

function setCapacity(app: FastifyInstance, activityName: string, maxParticipants: number): void {
  const activity = app.activities.get(activityName);
  if (!activity) {
    throw new Error(`missing fixture activity ${activityName}`);
  }
  activity.max_participants = maxParticipants;
}

describe('Activities API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildTestServer();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /activities', () => {
    it('returns every seeded activity', async () => {
      const response = await app.inject({ method: 'GET', url: '/activities' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(Object.keys(body)).toEqual([...SEED_ACTIVITY_NAMES]);
    });

    it('includes description, schedule, capacity and participants', async () => {
      const response = await app.inject({ method: 'GET', url: '/activities' });

      expect(response.json()['Chess Club']).toEqual({
        description: 'Learn strategies and compete in chess tournaments',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        max_participants: 12,
        participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
      });
    });

    it('reflects signups made by earlier requests', async () => {
      await app.inject({
        method: 'POST',
        url: '/activities/Art%20Club/signup',
        query: { email: 'painter@mergington.edu' },
      });

      const response = await app.inject({ method: 'GET', url: '/activities' });

      expect(response.json()['Art Club'].participants).toContain('painter@mergington.edu');
    });

    it('returns an empty object for an empty directory', async () => {
      const empty = await buildTestServer({ directory: new ActivityDirectory({}) });

      const response = await empty.inject({ method: 'GET', url: '/activities' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({});
      await empty.close();
    });
  });

  describe('POST /activities/:activityName/signup', () => {
    it('signs a student up', async () => {
      const email = 'testuser_unique@mergington.edu';

      const response = await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup',
        query: { email },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ message: `Signed up ${email} for Chess Club` });
      expect(participantsOf(app, 'Chess Club')).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
        email,
      ]);
    });

    it('rejects a duplicate signup without changing the roster', async () => {
      const email = 'duplicate_test@mergington.edu';
      await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup',
        query: { email },
      });

      const response = await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup',
        query: { email },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.detail).toBe('Student is already signed up for this activity');
      expect(body.error.code).toBe('ALREADY_SIGNED_UP');
      expect(participantsOf(app, 'Chess Club').filter((p) => p === email)).toHaveLength(1);
    });

    it('rejects a seeded participant signing up again', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Gym%20Class/signup',
        query: { email: 'john@mergington.edu' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().detail).toBe('Student is already signed up for this activity');
    });

    it('returns 404 for an unknown activity', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Nonexistent%20Club/signup',
        query: { email: 'test@mergington.edu' },
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.detail).toBe('Activity not found');
      expect(body.error.code).toBe('ACTIVITY_NOT_FOUND');
    });

    it('matches activity names exactly', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/chess%20club/signup',
        query: { email: 'test@mergington.edu' },
      });

      expect(response.statusCode).toBe(404);
    });

    it('does not treat object prototype keys as activities', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/constructor/signup',
        query: { email: 'test@mergington.edu' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().detail).toBe('Activity not found');
    });

    it('fills the last open spot and then reports the activity as full', async () => {
      setCapacity(app, 'Programming Class', participantsOf(app, 'Programming Class').length + 1);

      const first = await app.inject({
        method: 'POST',
        url: '/activities/Programming%20Class/signup',
        query: { email: 'first_in@mergington.edu' },
      });
      const second = await app.inject({
        method: 'POST',
        url: '/activities/Programming%20Class/signup',
        query: { email: 'too_late@mergington.edu' },
      });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(400);
      expect(second.json().detail).toBe('Activity is full');
      expect(second.json().error.code).toBe('ACTIVITY_FULL');
      expect(participantsOf(app, 'Programming Class')).not.toContain('too_late@mergington.edu');
    });

    it('rejects a signup when the roster already equals capacity', async () => {
      setCapacity(app, 'Debate Team', participantsOf(app, 'Debate Team').length);

      const response = await app.inject({
        method: 'POST',
        url: '/activities/Debate%20Team/signup',
        query: { email: 'speaker@mergington.edu' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().detail).toBe('Activity is full');
    });

    it('reports a duplicate before a full roster', async () => {
      setCapacity(app, 'Math Club', participantsOf(app, 'Math Club').length);
      const [existing] = participantsOf(app, 'Math Club');

      const response = await app.inject({
        method: 'POST',
        url: '/activities/Math%20Club/signup',
        query: { email: existing ?? '' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('ALREADY_SIGNED_UP');
    });

    it('treats emails differing only in case as distinct', async () => {
      const lower = await app.inject({
        method: 'POST',
        url: '/activities/Drama%20Club/signup',
        query: { email: 'casey@mergington.edu' },
      });
      const upper = await app.inject({
        method: 'POST',
        url: '/activities/Drama%20Club/signup',
        query: { email: 'Casey@Mergington.edu' },
      });

      expect(lower.statusCode).toBe(200);
      expect(upper.statusCode).toBe(200);
      expect(participantsOf(app, 'Drama Club')).toContain('casey@mergington.edu');
      expect(participantsOf(app, 'Drama Club')).toContain('Casey@Mergington.edu');
    });

    it('stores surrounding whitespace as part of the email', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Science%20Club/signup',
        query: { email: '  spaced@mergington.edu  ' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().message).toBe('Signed up   spaced@mergington.edu   for Science Club');
      expect(participantsOf(app, 'Science Club')).toContain('  spaced@mergington.edu  ');
      expect(participantsOf(app, 'Science Club')).not.toContain('spaced@mergington.edu');
    });

    it('returns 400 when the email query parameter is missing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup',
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.details.errors[0].field).toBe('email');
    });

    it('returns 400 for an empty email', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup?email=',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
      expect(participantsOf(app, 'Chess Club')).toHaveLength(2);
    });
  });

  describe('DELETE /activities/:activityName/participants/:email', () => {
    it('unregisters a signed-up student', async () => {
      const email = 'unregister_test@mergington.edu';
      await app.inject({
        method: 'POST',
        url: '/activities/Programming%20Class/signup',
        query: { email },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: `/activities/Programming%20Class/participants/${encodeURIComponent(email)}`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ message: `Unregistered ${email} from Programming Class` });
      expect(participantsOf(app, 'Programming Class')).not.toContain(email);
    });

    it('removes a seeded participant and keeps the others in order', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Chess%20Club/participants/michael%40mergington.edu',
      });

      expect(response.statusCode).toBe(200);
      expect(participantsOf(app, 'Chess Club')).toEqual(['daniel@mergington.edu']);
    });

    it('returns 404 for an unknown activity', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Nonexistent%20Club/participants/test%40mergington.edu',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().detail).toBe('Activity not found');
    });

    it('returns 404 for a student who is not registered', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Chess%20Club/participants/nobody%40mergington.edu',
      });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.detail).toBe('Student is not registered for this activity');
      expect(body.error.code).toBe('NOT_REGISTERED');
    });

    it('does not remove a student from a club they belong to elsewhere', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Gym%20Class/participants/michael%40mergington.edu',
      });

      expect(response.statusCode).toBe(404);
      expect(participantsOf(app, 'Chess Club')).toContain('michael@mergington.edu');
    });

    it('returns 404 on a second unregister of the same student', async () => {
      const url = '/activities/Chess%20Club/participants/daniel%40mergington.edu';

      const first = await app.inject({ method: 'DELETE', url });
      const second = await app.inject({ method: 'DELETE', url });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(404);
      expect(second.json().detail).toBe('Student is not registered for this activity');
    });

    it('frees a spot for the next signup', async () => {
      setCapacity(app, 'Basketball Team', participantsOf(app, 'Basketball Team').length);
      const [leaving] = participantsOf(app, 'Basketball Team');

      await app.inject({
        method: 'DELETE',
        url: `/activities/Basketball%20Team/participants/${encodeURIComponent(leaving ?? '')}`,
      });
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Basketball%20Team/signup',
        query: { email: 'replacement@mergington.edu' },
      });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('path parameter edges', () => {
    it('unregisters an email longer than 100 characters', async () => {
      const email = `${'a'.repeat(110)}@mergington.edu`;
      const signup = await app.inject({
        method: 'POST',
        url: '/activities/Chess%20Club/signup',
        query: { email },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: `/activities/Chess%20Club/participants/${encodeURIComponent(email)}`,
      });

      expect(signup.statusCode).toBe(200);
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ message: `Unregistered ${email} from Chess Club` });
      expect(participantsOf(app, 'Chess Club')).not.toContain(email);
    });

    it('routes activity names longer than 100 characters', async () => {
      const activityName = `Club ${'x'.repeat(150)}`;
      const longNamed = await buildTestServer({
        directory: new ActivityDirectory({
          [activityName]: {
            description: 'A club with a very long name',
            schedule: 'Sundays',
            max_participants: 3,
            participants: [],
          },
        }),
      });

      const response = await longNamed.inject({
        method: 'POST',
        url: `/activities/${encodeURIComponent(activityName)}/signup`,
        query: { email: 'long@mergington.edu' },
      });

      expect(response.statusCode).toBe(200);
      expect(longNamed.activities.get(activityName)?.participants).toEqual(['long@mergington.edu']);
      await longNamed.close();
    });

    it('unregisters an email with surrounding whitespace by its exact value', async () => {
      await app.inject({
        method: 'POST',
        url: '/activities/Science%20Club/signup',
        query: { email: '  spaced@mergington.edu  ' },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Science%20Club/participants/%20%20spaced%40mergington.edu%20%20',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().message).toBe('Unregistered   spaced@mergington.edu   from Science Club');
      expect(participantsOf(app, 'Science Club')).toEqual(['lucas@mergington.edu', 'grace@mergington.edu']);
    });

    it('does not match a whitespace variant of a registered email', async () => {
      await app.inject({
        method: 'POST',
        url: '/activities/Science%20Club/signup',
        query: { email: 'spaced@mergington.edu' },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Science%20Club/participants/%20spaced%40mergington.edu',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().detail).toBe('Student is not registered for this activity');
      expect(participantsOf(app, 'Science Club')).toContain('spaced@mergington.edu');
    });

    it('keeps a literal plus sign in the path', async () => {
      await app.inject({
        method: 'POST',
        url: '/activities/Art%20Club/signup',
        query: { email: 'first+clubs@mergington.edu' },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Art%20Club/participants/first+clubs%40mergington.edu',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().message).toBe('Unregistered first+clubs@mergington.edu from Art Club');
      expect(participantsOf(app, 'Art Club')).not.toContain('first+clubs@mergington.edu');
    });

    it('does not read a plus sign in the path as a space', async () => {
      await app.inject({
        method: 'POST',
        url: '/activities/Art%20Club/signup',
        query: { email: 'first+clubs@mergington.edu' },
      });

      const response = await app.inject({
        method: 'DELETE',
        url: '/activities/Art%20Club/participants/first%20clubs%40mergington.edu',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().detail).toBe('Student is not registered for this activity');
      expect(participantsOf(app, 'Art Club')).toContain('first+clubs@mergington.edu');
    });
  });

  describe('Error envelope', () => {
    it('echoes the X-Request-ID header in error bodies', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/activities/Nonexistent%20Club/signup',
        query: { email: 'test@mergington.edu' },
        headers: { 'x-request-id': 'req-test-123' },
      });

      const body = response.json();
      expect(body.success).toBe(false);
      expect(body.requestId).toBe('req-test-123');
      expect(body.error.message).toBe('Activity not found');
      expect(body.error.details).toEqual({ resourceType: 'Activity', activity: 'Nonexistent Club' });
    });

    it('returns 404 with a Not Found detail for unknown routes', async () => {
      const response = await app.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json().detail).toBe('Not Found');
      expect(response.json().error.code).toBe('RESOURCE_NOT_FOUND');
    });
  });
});
