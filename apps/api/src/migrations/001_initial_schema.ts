import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('prompts', (table) => {
    table.increments('id');
    table.string('date', 32).notNullable();
    table.text('prompt').notNullable();
    table.string('tags', 1024).nullable();
    table.index(['date'], 'idx_prompts_date');
    table.index(['tags'], 'idx_prompts_tags');
  });

  await knex.schema.createTable('models', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable().unique();
    table.text('api_url').notNullable();
    table.string('api_id', 255).notNullable();
    table.string('model_name', 255).nullable();
    table.integer('is_active').notNullable().defaultTo(1);
    table.index(['is_active'], 'idx_models_active');
  });

  await knex.schema.createTable('results', (table) => {
    table.increments('id');
    table
      .integer('prompt_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('prompts')
      .onDelete('CASCADE');
    table
      .integer('model_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('models')
      .onDelete('RESTRICT');
    table.text('response').notNullable();
    table.string('date', 32).notNullable();
    table.integer('selected').notNullable().defaultTo(0);
    table.string('error_kind', 32).nullable();
    table.index(['prompt_id'], 'idx_results_prompt');
    table.index(['model_id'], 'idx_results_model');
    table.index(['date'], 'idx_results_date');
    table.index(['selected'], 'idx_results_selected');
  });

  await knex.schema.createTable('settings', (table) => {
    table.string('key', 255).primary();
    table.text('value').notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('results');
  await knex.schema.dropTableIfExists('settings');
  await knex.schema.dropTableIfExists('models');
  await knex.schema.dropTableIfExists('prompts');
}
