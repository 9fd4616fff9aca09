import { useState, type ReactNode } from "react"
import { useForm, type UseFormRegisterReturn } from "react-hook-form"
import { Save } from "lucide-react"
import {
  EXPERIENCE_LEVELS,
  REQUIRED_PROFILE_FIELDS,
  TARGET_INDUSTRIES,
  findMissingFields,
  profileToFormInput,
  type ProfileFormInput,
  type ProfileRecord,
  type RequiredProfileField,
} from "@shared/types"
import { ApiError } from "@/api/base-client"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Button } from "@/components/ui/button"
import { Checkbox } from "@/components/ui/checkbox"
import { Input } from "@/components/ui/input"
import { Label } from "@/components/ui/label"
import { Select } from "@/components/ui/select"
import { Textarea } from "@/components/ui/textarea"
import { useSession } from "@/contexts/SessionContext"
import { getUserMessage, isValidationError } from "@/lib/api-error-handler"

export const MISSING_FIELDS_MESSAGE = "Please fill in all required fields (marked with *)"

type FormState = Required<ProfileFormInput>
type TextFieldName = Exclude<keyof FormState, "current_job" | "target_industry" | "experience_level">

const EMPTY_FORM: FormState = {
  full_name: "",
  email: "",
  phone: "",
  location: "",
  linkedin_url: "",
  github_url: "",
  portfolio_url: "",
  target_position: "",
  target_industry: "Technology",
  experience_level: "Entry Level",
  company: "",
  job_title: "",
  job_location: "",
  start_date: "",
  end_date: "",
  current_job: false,
  responsibilities: "",
  institution: "",
  degree: "",
  graduation_date: "",
  gpa: "",
  technical_skills: "",
  soft_skills: "",
  project_title: "",
  project_description: "",
  project_technologies: "",
  project_link: "",
  certifications: "",
}

const initialForm = (profile: ProfileRecord | null): FormState =>
  profile ? { ...EMPTY_FORM, ...profileToFormInput(profile) } : EMPTY_FORM

const isRequiredField = (value: unknown): value is RequiredProfileField =>
  REQUIRED_PROFILE_FIELDS.some((field) => field === value)

function missingFromError(error: unknown): RequiredProfileField[] {
  if (!(error instanceof ApiError) || !isValidationError(error)) return []
  const missing = error.details?.missing
  return Array.isArray(missing) ? missing.filter(isRequiredField) : []
}

interface FieldProps {
  label: string
  placeholder?: string
  type?: "text" | "email" | "tel" | "url" | "month"
  multiline?: boolean
  invalid?: boolean
  registration: UseFormRegisterReturn<TextFieldName>
}

function Field({ label, placeholder, type = "text", multiline = false, invalid = false, registration }: FieldProps) {
  const id = `profile-${registration.name}`
  return (
    <div className="space-y-1.5">
      <Label htmlFor={id}>{label}</Label>
      {multiline ? (
        <Textarea id={id} rows={4} placeholder={placeholder} aria-invalid={invalid || undefined} {...registration} />
      ) : (
        <Input id={id} type={type} placeholder={placeholder} aria-invalid={invalid || undefined} {...registration} />
      )}
    </div>
  )
}

function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <fieldset className="space-y-4">
      <legend className="mb-2 text-lg font-semibold">{title}</legend>
      {children}
    </fieldset>
  )
}

/**
 * Career profile form. Submitting replaces the working profile; saving it to
 * the account is a separate sidebar action.
 */
export function InputDataTab() {
  const { state, submitProfile } = useSession()
  const [notice, setNotice] = useState<{ ok: boolean; message: string } | null>(null)
  const {
    register,
    handleSubmit,
    setError,
    clearErrors,
    watch,
    formState: { errors, isSubmitting },
  } = useForm<FormState>({ defaultValues: initialForm(state.profile) })

  const currentJob = watch("current_job")

  const flagMissing = (fields: readonly RequiredProfileField[]) => {
    for (const field of fields) {
      setError(field, { type: "required" })
    }
  }

  const field = (name: TextFieldName) => ({ registration: register(name), invalid: Boolean(errors[name]) })

  const onSubmit = async (values: FormState) => {
    const missing = findMissingFields(values)
    if (missing.length > 0) {
      flagMissing(missing)
      setNotice({ ok: false, message: MISSING_FIELDS_MESSAGE })
      return
    }

    clearErrors()
    setNotice(null)
    try {
      const message = await submitProfile(values)
      setNotice({ ok: true, message: message ?? "Data saved! Navigate to other tabs to generate documents." })
    } catch (error) {
      flagMissing(missingFromError(error))
      setNotice({ ok: false, message: getUserMessage(error) })
    }
  }

  return (
    <form className="space-y-8" onSubmit={handleSubmit(onSubmit)} noValidate aria-label="Profile information">
      <h2 className="text-xl font-semibold">Provide Your Information</h2>

      <Section title="Personal Information">
        <div className="grid gap-4 md:grid-cols-2">
          <Field label="Full Name*" placeholder="John Doe" {...field("full_name")} />
          <Field label="LinkedIn Profile URL" type="url" placeholder="https://linkedin.com/in/username" {...field("linkedin_url")} />
          <Field label="Email*" type="email" placeholder="john.doe@email.com" {...field("email")} />
          <Field label="GitHub Profile URL" type="url" placeholder="https://github.com/username" {...field("github_url")} />
          <Field label="Phone" type="tel" placeholder="+1 (555) 123-4567" {...field("phone")} />
          <Field label="Personal Portfolio URL" type="url" placeholder="https://yourportfolio.com" {...field("portfolio_url")} />
          <Field label="Location" placeholder="City, State" {...field("location")} />
        </div>
      </Section>

      <Section title="Career Objectives">
        <Field label="Target Position*" placeholder="Software Engineer, Data Scientist, etc." {...field("target_position")} />
        <div className="grid gap-4 md:grid-cols-2">
          <div className="space-y-1.5">
            <Label htmlFor="profile-target_industry">Target Industry</Label>
            <Select id="profile-target_industry" options={TARGET_INDUSTRIES} {...register("target_industry")} />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="profile-experience_level">Experience Level</Label>
            <Select id="profile-experience_level" options={EXPERIENCE_LEVELS} {...register("experience_level")} />
          </div>
        </div>
      </Section>

      <Section title="Work Experience">
        <div className="grid gap-4 md:grid-cols-2">
          <Field label="Company Name" placeholder="Tech Company Inc." {...field("company")} />
          <Field label="Job Location" placeholder="Remote / City, State" {...field("job_location")} />
          <Field label="Job Title" placeholder="Software Developer" {...field("job_title")} />
          <Field label="Start Date" type="month" {...field("start_date")} />
          {!currentJob && <Field label="End Date" type="month" {...field("end_date")} />}
        </div>
        <div className="flex items-center gap-2">
          <Checkbox id="profile-current_job" {...register("current_job")} />
          <Label htmlFor="profile-current_job">I currently work here</Label>
        </div>
        <Field
          label="Responsibilities & Achievements"
          placeholder="Describe your key responsibilities and achievements..."
          multiline
          {...field("responsibilities")}
        />
      </Section>

      <Section title="Education">
        <div className="grid gap-4 md:grid-cols-2">
          <Field label="Institution*" placeholder="University Name" {...field("institution")} />
          <Field label="Graduation Date" type="month" {...field("graduation_date")} />
          <Field label="Degree*" placeholder="Bachelor of Science in Computer Science" {...field("degree")} />
          <Field label="GPA" placeholder="3.8/4.0" {...field("gpa")} />
        </div>
      </Section>

      <Section title="Skills & Technologies">
        <Field
          label="List your technical skills (comma-separated)"
          placeholder="Python, JavaScript, React, SQL, Machine Learning..."
          multiline
          {...field("technical_skills")}
        />
        <Field
          label="List your soft skills (comma-separated)"
          placeholder="Leadership, Communication, Problem Solving..."
          multiline
          {...field("soft_skills")}
        />
      </Section>

      <Section title="Projects">
        <div className="grid gap-4 md:grid-cols-2">
          <Field label="Project Title" placeholder="Machine Learning Fraud Detection" {...field("project_title")} />
          <Field label="Technologies Used" placeholder="Python, Scikit-learn, Pandas, Flask" {...field("project_technologies")} />
          <Field label="Project Link (optional)" type="url" placeholder="https://github.com/username/project" {...field("project_link")} />
        </div>
        <Field label="Project Description" placeholder="Describe the project..." multiline {...field("project_description")} />
      </Section>

      <Section title="Certifications">
        <Field
          label="Certifications (one per line)"
          placeholder={"AWS Certified Solutions Architect\nGoogle Data Analytics Certificate"}
          multiline
          {...field("certifications")}
        />
      </Section>

      <Button type="submit" size="lg" className="w-full" disabled={isSubmitting}>
        <Save aria-hidden />
        Save and Continue
      </Button>

      {notice && (
        <Alert variant={notice.ok ? "success" : "destructive"}>
          <AlertDescription>{notice.message}</AlertDescription>
        </Alert>
      )}
    </form>
  )
}
