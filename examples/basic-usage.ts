/**
 * Basic Usage Example
 *
 * Demonstrates inserting entries and looking them up by id and by name.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { DataMap, KeyNotFoundError } from "@datamap/sdk";

function main(): void {
  const items = new DataMap();

  console.log("✏️  Inserting entries...");
  items.insert({ name: { en: "Potion", ja: "回復薬" }, rarity: 1, buy: 66 });
  items.insert({ name: { en: "Mega Potion", ja: "回復薬グレート" }, rarity: 2, buy: 0 });
  items.addWithId(100, { name: { en: "Max Potion", ja: "秘薬" }, rarity: 6 });
  const antidote = items.insert({ name: { en: "Antidote", ja: "解毒薬" }, rarity: 1 });
  console.log(`✅ ${items.size} entries, next generated id was ${antidote.id}`);

  console.log("\n🔎 Looking up by name...");
  const potion = items.entryOf("ja", "回復薬");
  if (potion) {
    console.log(`   回復薬 is "${potion.name("en")}" (id ${potion.id})`);
  }

  console.log("\n📋 English names:");
  for (const name of items.names("en")) {
    console.log(`   - ${name}`);
  }

  console.log("\n🔀 Reordering fields...");
  antidote.setAfter("buy", 30, "name");
  console.log(`   ${[...antidote.fields()].join(", ")}`);

  console.log("\n✏️  Renaming...");
  antidote.set("name", { en: "Antidote", ja: "解毒薬", de: "Gegengift" });
  console.log(`   Gegengift -> id ${items.idOf("de", "Gegengift")}`);

  try {
    items.get(42);
  } catch (err) {
    if (err instanceof KeyNotFoundError) {
      console.log(`\n⚠️  ${err.message}`);
    } else {
      throw err;
    }
  }
}

main();
