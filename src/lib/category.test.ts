import assert from "node:assert/strict";
import test from "node:test";
import { categoryNameFromSlug, toCategorySource } from "./category";
import { ParseError } from "./errors";

test("categoryNameFromSlug drops the trailing filter code", () => {
  assert.equal(categoryNameFromSlug("mens-shoes-nik1zy7ok"), "mens shoes");
  assert.equal(categoryNameFromSlug("womens-accessories-equipment-5e1x6zawwpw"), "womens accessories equipment");
});

test("categoryNameFromSlug keeps single-token slugs", () => {
  assert.equal(categoryNameFromSlug("sale"), "sale");
});

test("toCategorySource derives name and api path", () => {
  const source = toCategorySource("https://www.nike.com/in/w/kids-shoes-v4dhzy7ok/");
  assert.deepEqual(source, {
    url: "https://www.nike.com/in/w/kids-shoes-v4dhzy7ok/",
    name: "kids shoes",
    path: "in/w/kids-shoes-v4dhzy7ok"
  });
});

test("toCategorySource rejects urls without a path", () => {
  assert.throws(() => toCategorySource("https://www.nike.com/"), ParseError);
  assert.throws(() => toCategorySource("not a url"), ParseError);
});
