"use client";

import { useState } from "react";
import styles from "./page.module.css";
import { EXPORT_FILE_NAME, exportUrl, runScrape } from "../lib/api";
import type { PropertyRow } from "../lib/types";
import PropertyTable from "./PropertyTable";

const EMPTY_MESSAGE = "No properties found or parsed. Check selectors.";

export default function Home() {
  const [url, setUrl] = useState("");

  const [loading, setLoading] = useState(false);
  const [warning, setWarning] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [emptyMessage, setEmptyMessage] = useState<string | null>(null);
  const [results, setResults] = useState<PropertyRow[]>([]);

  async function onSubmit(e: React.FormEvent) {
    e.preventDefault();
    setWarning(null);
    setError(null);
    setEmptyMessage(null);

    const target = url.trim();
    if (!target) {
      setWarning("Please enter a valid URL.");
      return;
    }

    setLoading(true);
    try {
      const response = await runScrape(target);
      // Earlier rows stay on screen, and downloadable, until a scrape yields new ones.
      if (response.properties.length === 0) {
        setEmptyMessage(response.message ?? EMPTY_MESSAGE);
        return;
      }
      setResults(response.properties);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to retrieve the HTML content.");
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className={styles.page}>
      <main className={styles.main}>
        <div className={styles.header}>
          <h1 className={styles.title}>Real Estate Web Scraper</h1>
          <p className={styles.subtitle}>Scrape property data from a listings results page.</p>
        </div>

        <form className={styles.form} onSubmit={onSubmit}>
          <fieldset className={styles.fieldset} disabled={loading}>
            <label className={styles.label}>
              URL
              <input
                className={styles.input}
                value={url}
                onChange={(e) => setUrl(e.target.value)}
                placeholder="Enter URL of the real estate page"
              />
            </label>

            <button className={styles.button} type="submit">
              {loading ? "Getting Data…" : "Get Data"}
            </button>
          </fieldset>
        </form>

        {warning ? (
          <div className={styles.warning} role="alert">
            {warning}
          </div>
        ) : null}
        {error ? (
          <div className={styles.error} role="alert">
            {error}
          </div>
        ) : null}
        {emptyMessage ? (
          <div className={styles.error} role="status" aria-live="polite">
            {emptyMessage}
          </div>
        ) : null}

        {results.length > 0 ? (
          <section className={styles.results}>
            <div className={styles.resultsHeader}>
              <h2>Scraped Property Data</h2>
              <span className={styles.count}>{results.length} listing(s)</span>
            </div>

            <PropertyTable rows={results} />

            <a className={styles.button} href={exportUrl()} download={EXPORT_FILE_NAME}>
              Download data as Excel
            </a>
          </section>
        ) : null}
      </main>
    </div>
  );
}
