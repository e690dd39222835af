export let migrationSQL = /* sql */ `
-- Up
create table if not exists token (
  id integer primary key
, chars text not null unique
, frequency integer not null
);
create table if not exists merge (
  id integer primary key
, a_id integer not null references token(id)
, b_id integer not null references token(id)
, c_id integer not null references token(id)
, weighted_frequency integer not null
, reported_frequency integer not null
);
-- Down
drop table if exists merge;
drop table if exists token;
`
