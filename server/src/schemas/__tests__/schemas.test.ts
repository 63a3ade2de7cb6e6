import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors';
import { RegisterSchema } from '../auth';
import { parse } from '../common';
import { ProjectCreateSchema } from '../project';
import { TaskCreateSchema, TaskListQuery } from '../task';
import { InviteSchema, MemberListQuery, TeamCreateSchema } from '../team';

describe('request schemas', () => {
  it('normalises registration input', () => {
    expect(
      parse(RegisterSchema, { email: ' Kim@Example.COM ', password: 'password123', firstName: ' Kim ', lastName: 'Lee' })
    ).toEqual({ email: 'kim@example.com', password: 'password123', firstName: 'Kim', lastName: 'Lee', timezone: 'UTC' });
  });

  it('throws ValidationError with field paths', () => {
    try {
      parse(RegisterSchema, { email: 'kim@example.com', password: 'short', firstName: 'Kim', lastName: 'Lee' });
      throw new Error('expected a validation failure');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ status: 400, details: [{ path: 'password' }] });
    }
  });

  it('accepts dates and datetimes', () => {
    const task = parse(TaskCreateSchema, { title: 'Ship', dueDate: '2026-03-05' });
    expect(task.dueDate).toEqual(new Date('2026-03-05T00:00:00.000Z'));
    expect(task.assigneeIds).toEqual([]);
    expect(task.position).toBe(0);

    const project = parse(ProjectCreateSchema, { name: 'P', endDate: '2026-03-05T10:00:00+02:00' });
    expect(project.endDate).toEqual(new Date('2026-03-05T08:00:00.000Z'));
    expect(project.status).toBe('planning');
  });

  it('coerces list queries', () => {
    expect(parse(TaskListQuery, { skip: '20', limit: '10', includeArchived: 'true' })).toEqual({
      skip: 20,
      limit: 10,
      includeArchived: true
    });
    expect(() => parse(TaskListQuery, { limit: '0' })).toThrow('Validation failed');
  });

  it('needs an email or a user id to invite', () => {
    expect(() => parse(InviteSchema, { role: 'member' })).toThrow(ValidationError);
    expect(parse(InviteSchema, { email: 'A@B.io' })).toEqual({ email: 'a@b.io', role: 'member' });
  });

  it('reads the pending-members flag like other query flags', () => {
    expect(parse(MemberListQuery, {})).toEqual({ includePending: false });
    expect(parse(MemberListQuery, { includePending: '1' })).toEqual({ includePending: true });
    expect(parse(MemberListQuery, { includePending: 'true' })).toEqual({ includePending: true });
    expect(() => parse(MemberListQuery, { includePending: 'yes' })).toThrow(ValidationError);
  });

  it('rejects malformed slugs', () => {
    expect(() => parse(TeamCreateSchema, { name: 'T', slug: 'Bad Slug' })).toThrow(ValidationError);
    expect(parse(TeamCreateSchema, { name: 'T', slug: 'good-slug' })).toMatchObject({
      slug: 'good-slug',
      allowPublicSignup: false,
      defaultTaskPriority: 'medium'
    });
  });
});
