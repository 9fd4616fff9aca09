import { useState, type FormEvent } from "react"
import { LogIn, UserPlus } from "lucide-react"
import { Alert, AlertDescription } from "@/components/ui/alert"
import { Button } from "@/components/ui/button"
import { Input } from "@/components/ui/input"
import { Label } from "@/components/ui/label"
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs"
import { useSession } from "@/contexts/SessionContext"
import { getUserMessage } from "@/lib/api-error-handler"

type Notice = { variant: "success" | "warning" | "destructive"; message: string }

function NoticeAlert({ notice }: { notice: Notice | null }) {
  if (!notice) return null
  return (
    <Alert variant={notice.variant}>
      <AlertDescription>{notice.message}</AlertDescription>
    </Alert>
  )
}

function LoginForm() {
  const { login } = useSession()
  const [username, setUsername] = useState("")
  const [password, setPassword] = useState("")
  const [notice, setNotice] = useState<Notice | null>(null)
  const [submitting, setSubmitting] = useState(false)

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    if (!username.trim() || !password) {
      setNotice({ variant: "warning", message: "Please enter username and password" })
      return
    }

    setSubmitting(true)
    setNotice(null)
    try {
      await login(username, password)
    } catch (error) {
      setNotice({ variant: "destructive", message: getUserMessage(error) })
      setSubmitting(false)
    }
  }

  return (
    <form className="space-y-3" onSubmit={handleSubmit} noValidate>
      <div className="space-y-1.5">
        <Label htmlFor="login-username">Username</Label>
        <Input
          id="login-username"
          autoComplete="username"
          value={username}
          onChange={(event) => setUsername(event.target.value)}
        />
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="login-password">Password</Label>
        <Input
          id="login-password"
          type="password"
          autoComplete="current-password"
          value={password}
          onChange={(event) => setPassword(event.target.value)}
        />
      </div>
      <Button type="submit" className="w-full" disabled={submitting}>
        <LogIn aria-hidden />
        Login
      </Button>
      <NoticeAlert notice={notice} />
    </form>
  )
}

function RegisterForm() {
  const { register } = useSession()
  const [username, setUsername] = useState("")
  const [password, setPassword] = useState("")
  const [confirm, setConfirm] = useState("")
  const [notice, setNotice] = useState<Notice | null>(null)
  const [submitting, setSubmitting] = useState(false)

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    if (!username.trim() || !password) {
      setNotice({ variant: "warning", message: "Please fill all fields" })
      return
    }
    if (password !== confirm) {
      setNotice({ variant: "destructive", message: "Passwords do not match" })
      return
    }

    setSubmitting(true)
    setNotice(null)
    try {
      const message = await register(username, password, confirm)
      setNotice({ variant: "success", message })
      setPassword("")
      setConfirm("")
    } catch (error) {
      setNotice({ variant: "destructive", message: getUserMessage(error) })
    } finally {
      setSubmitting(false)
    }
  }

  return (
    <form className="space-y-3" onSubmit={handleSubmit} noValidate>
      <div className="space-y-1.5">
        <Label htmlFor="register-username">New Username</Label>
        <Input
          id="register-username"
          autoComplete="username"
          value={username}
          onChange={(event) => setUsername(event.target.value)}
        />
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="register-password">New Password</Label>
        <Input
          id="register-password"
          type="password"
          autoComplete="new-password"
          value={password}
          onChange={(event) => setPassword(event.target.value)}
        />
      </div>
      <div className="space-y-1.5">
        <Label htmlFor="register-confirm">Confirm Password</Label>
        <Input
          id="register-confirm"
          type="password"
          autoComplete="new-password"
          value={confirm}
          onChange={(event) => setConfirm(event.target.value)}
        />
      </div>
      <Button type="submit" className="w-full" disabled={submitting}>
        <UserPlus aria-hidden />
        Register
      </Button>
      <NoticeAlert notice={notice} />
    </form>
  )
}

/**
 * Sidebar panel shown while signed out: Login and Register tabs.
 */
export function AuthPanel() {
  return (
    <Tabs defaultValue="login" className="w-full">
      <TabsList className="grid w-full grid-cols-2">
        <TabsTrigger value="login">Login</TabsTrigger>
        <TabsTrigger value="register">Register</TabsTrigger>
      </TabsList>
      <TabsContent value="login">
        <LoginForm />
      </TabsContent>
      <TabsContent value="register">
        <RegisterForm />
      </TabsContent>
    </Tabs>
  )
}
