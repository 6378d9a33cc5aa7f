import { Certification } from "../../shared/types/profile.types";
import { splitLines, stripBullet } from "./entries";

const MIN_CERTIFICATION_LENGTH = 10;
const WITH_ISSUER = /^(.+?)\s+[-–—]\s+(.+?)(?:\s*\(((?:19|20)\d{2})\))?$/;
const WITH_YEAR = /^(.+?)\s*\(((?:19|20)\d{2})\)$/;

export function parseCertification(line: string): Certification {
  const withIssuer = WITH_ISSUER.exec(line);
  if (withIssuer) {
    return { name: withIssuer[1].trim(), issuer: withIssuer[2].trim(), dateIssued: withIssuer[3] ?? null };
  }
  const withYear = WITH_YEAR.exec(line);
  if (withYear) {
    return { name: withYear[1].trim(), issuer: null, dateIssued: withYear[2] };
  }
  return { name: line, issuer: null, dateIssued: null };
}

export function extractCertifications(text: string): Certification[] {
  return splitLines(text)
    .map(stripBullet)
    .filter((line) => line.length > MIN_CERTIFICATION_LENGTH)
    .map(parseCertification);
}
