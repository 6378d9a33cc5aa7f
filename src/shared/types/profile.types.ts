export type SectionType =
  | "contact"
  | "summary"
  | "experience"
  | "education"
  | "skills"
  | "projects"
  | "certifications"
  | "languages"
  | "achievements";

export const SECTION_TYPES: readonly SectionType[] = [
  "contact",
  "summary",
  "experience",
  "education",
  "skills",
  "projects",
  "certifications",
  "languages",
  "achievements",
];

export interface ContactInfo {
  name: string | null;
  email: string | null;
  phone: string | null;
  linkedin: string | null;
  github: string | null;
  website: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  postalCode: string | null;
}

export interface WorkExperience {
  company: string | null;
  position: string | null;
  location: string | null;
  startDate: string | null;
  endDate: string | null;
  description: string[];
  technologies: string[];
}

export interface Education {
  institution: string | null;
  degree: string | null;
  fieldOfStudy: string | null;
  graduationYear: string | null;
  gpa: string | null;
  description: string[];
}

export interface Project {
  name: string;
  description: string;
  technologies: string[];
  url: string | null;
}

export interface Certification {
  name: string;
  issuer: string | null;
  dateIssued: string | null;
}

export interface CandidateProfile {
  contactInfo: ContactInfo;
  summary: string;
  workExperience: WorkExperience[];
  education: Education[];
  skills: string[];
  projects: Project[];
  certifications: Certification[];
  languages: string[];
  achievements: string[];
  sectionsFound: SectionType[];
  parsingConfidence: number;
}
