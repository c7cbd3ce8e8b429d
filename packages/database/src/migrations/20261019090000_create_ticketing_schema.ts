import type { Knex } from 'knex';
import {
  PROJECT_ROLES,
  TEAM_ROLES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  TICKET_TYPES,
} from '@ticketdesk/types';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable();
    table.string('email', 255).notNullable().unique();
    table.boolean('is_available').notNullable().defaultTo(true);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('teams', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable();
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('projects', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable();
    table.integer('worker_team_id').unsigned().nullable()
      .references('id').inTable('teams').onDelete('SET NULL');
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('project_teams', (table) => {
    table.integer('project_id').unsigned().notNullable()
      .references('id').inTable('projects').onDelete('CASCADE');
    table.integer('team_id').unsigned().notNullable()
      .references('id').inTable('teams').onDelete('CASCADE');
    table.primary(['project_id', 'team_id']);
  });

  await knex.schema.createTable('user_teams', (table) => {
    table.increments('id');
    table.integer('user_id').unsigned().notNullable()
      .references('id').inTable('users').onDelete('CASCADE');
    table.integer('team_id').unsigned().notNullable()
      .references('id').inTable('teams').onDelete('CASCADE');
    table.enu('role', [...TEAM_ROLES]).notNullable().defaultTo('member');
    table.timestamp('joined_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.unique(['user_id', 'team_id']);
  });

  await knex.schema.createTable('project_users', (table) => {
    table.increments('id');
    table.integer('user_id').unsigned().notNullable()
      .references('id').inTable('users').onDelete('CASCADE');
    table.integer('project_id').unsigned().notNullable()
      .references('id').inTable('projects').onDelete('CASCADE');
    table.enu('role', [...PROJECT_ROLES]).notNullable().defaultTo('member');
    table.unique(['user_id', 'project_id']);
  });

  await knex.schema.createTable('tickets', (table) => {
    table.increments('id');
    table.string('title', 255).notNullable();
    table.text('description').notNullable();
    table.enu('type', [...TICKET_TYPES]).notNullable().defaultTo('worker');
    table.enu('priority', [...TICKET_PRIORITIES]).notNullable().defaultTo('medium');
    table.enu('status', [...TICKET_STATUSES]).notNullable().defaultTo('open');
    table.integer('created_by').unsigned().notNullable()
      .references('id').inTable('users');
    table.integer('assigned_to').unsigned().nullable()
      .references('id').inTable('users').onDelete('SET NULL');
    table.integer('worker_team_id').unsigned().nullable()
      .references('id').inTable('teams').onDelete('SET NULL');
    table.integer('team_id').unsigned().notNullable()
      .references('id').inTable('teams');
    table.integer('project_id').unsigned().notNullable()
      .references('id').inTable('projects').onDelete('CASCADE');
    table.text('feedback').nullable();
    table.boolean('confirmed').notNullable().defaultTo(false);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('closed_at', { useTz: true }).nullable();
    table.index(['project_id', 'status']);
    table.index(['project_id', 'created_by']);
    table.index(['project_id', 'assigned_to']);
  });

  await knex.schema.createTable('api_keys', (table) => {
    table.increments('id');
    table.integer('user_id').unsigned().notNullable()
      .references('id').inTable('users').onDelete('CASCADE');
    table.string('key_hash', 64).notNullable().unique();
    table.string('description', 255).nullable();
    table.boolean('active').notNullable().defaultTo(true);
    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp('last_used_at', { useTz: true }).nullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('api_keys');
  await knex.schema.dropTableIfExists('tickets');
  await knex.schema.dropTableIfExists('project_users');
  await knex.schema.dropTableIfExists('user_teams');
  await knex.schema.dropTableIfExists('project_teams');
  await knex.schema.dropTableIfExists('projects');
  await knex.schema.dropTableIfExists('teams');
  await knex.schema.dropTableIfExists('users');
}
