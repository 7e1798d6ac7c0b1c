/*********************************************************************
 * src/collections/directory.ts
 *
 * One `<identity>.gpx` file per record in a single folder. New
 * identities come from the title; the file time follows the track
 * start so a plain `ls -t` sorts by ride date.
 *********************************************************************/

import * as fs from "fs";
import * as path from "path";
import { type Capabilities, Collection, type ListedRecord } from "../collection.ts";
import { getConfig } from "../config.ts";
import { parseGpxXml } from "../gpxXml.ts";
import type { TrackRecord } from "../record.ts";

const SUFFIX = ".gpx";

export class DirectoryCollection extends Collection {
  readonly kind = "directory";
  readonly capabilities: Capabilities = {
    list: true,
    readFull: true,
    writeFull: true,
    writeField: new Set(),
    remove: true,
    rename: true,
  };

  constructor(url: string = getConfig().directory) {
    super(path.resolve(url));
    fs.mkdirSync(this.url, { recursive: true });
  }

  gpxPath(identity: string): string {
    return path.join(this.url, identity + SUFFIX);
  }

  protected *listRecords(): Iterable<ListedRecord> {
    const names = fs
      .readdirSync(this.url)
      .filter((name) => name.endsWith(SUFFIX))
      .sort();
    for (const name of names) {
      yield { identity: name.slice(0, -SUFFIX.length), header: {} };
    }
  }

  protected readRecord(record: TrackRecord): void {
    const identity = record.identity ?? "";
    record.populate(parseGpxXml(fs.readFileSync(this.gpxPath(identity), "utf8")));
  }

  protected writeRecord(record: TrackRecord, identity: string | undefined): string {
    const id = identity ?? this.unique(sanitize(record.getTitle()) || "track");
    const file = this.gpxPath(id);
    fs.writeFileSync(file, record.toXml(), "utf8");
    const start = record.firstTime();
    if (start) fs.utimesSync(file, start, start);
    return id;
  }

  protected renameIdentity(from: string, to: string): void {
    const target = this.gpxPath(to);
    if (fs.existsSync(target)) throw new Error(`${target} exists`);
    fs.renameSync(this.gpxPath(from), target);
  }

  protected removeIdentity(identity: string): void {
    fs.unlinkSync(this.gpxPath(identity));
  }

  private unique(wanted: string): string {
    let result = wanted;
    for (let n = 1; fs.existsSync(this.gpxPath(result)); n++) result = `${wanted}.${n}`;
    return result;
  }
}

/** Something usable as a file name: no path separators, no control characters. */
function sanitize(title: string): string {
  return title
    .replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_")
    .trim()
    .slice(0, 80);
}
