export function Header() {
  return (
    <header className="rounded-xl bg-gradient-to-r from-indigo-500 to-purple-600 px-6 py-8 text-center text-white shadow">
      <h1 className="text-3xl font-bold tracking-tight">Portfolio Maker</h1>
      <p className="mt-2 text-white/85">AI-Powered Resume &amp; Portfolio Builder</p>
    </header>
  )
}
