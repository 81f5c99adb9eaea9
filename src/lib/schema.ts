import type { Pool } from 'pg';

export async function ensureSchema(db: Pool) {
  await db.query(`
    create table if not exists players (
      id text primary key,
      username text not null,
      password_hash text not null,
      created_at timestamptz not null default now()
    );

    create table if not exists games (
      id text primary key,
      x_player_id text not null references players(id) on delete restrict,
      o_player_id text references players(id) on delete restrict,
      opponent_type text not null check (opponent_type in ('human', 'computer')),
      board jsonb not null,
      turn text not null check (turn in ('X', 'O')),
      winner text check (winner in ('X', 'O', 'draw')),
      complete boolean not null default false,
      created_at timestamptz not null default now(),
      updated_at timestamptz not null default now()
    );

    create index if not exists idx_games_x_player on games(x_player_id);
    create index if not exists idx_games_o_player on games(o_player_id);
    create index if not exists idx_games_created_at on games(created_at desc);

    create table if not exists moves (
      id bigserial primary key,
      game_id text not null references games(id) on delete cascade,
      player_id text references players(id) on delete set null, -- null = computer
      row_index smallint not null check (row_index between 0 and 2),
      col_index smallint not null check (col_index between 0 and 2),
      mark text not null check (mark in ('X', 'O')),
      move_number smallint not null check (move_number between 1 and 9),
      created_at timestamptz not null default now(),
      unique (game_id, move_number)
    );

    create unique index if not exists ux_players_username on players(lower(username));
  `);
}
