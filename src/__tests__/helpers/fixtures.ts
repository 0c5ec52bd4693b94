/**
 * Test Fixtures
 * Reusable test data
 */

// ============================================================================
// Three-page site: home → b, c; b → home and an external page
// ============================================================================

export const SITE_ROOT = 'https://site.test/';

export const siteHomeHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Home</title>
  <meta name="description" content="Home page">
  <link rel="stylesheet" href="/styles.css">
</head>
<body>
  <h1>Welcome</h1>
  <a href="/b">Page B</a>
  <a href="/c">Page C</a>
  <a href="/b">Page B again</a>
  <a href="mailto:team@site.test">Mail</a>
  <img src="/logo.png" alt="Site logo">
  <script src="/app.js"></script>
</body>
</html>
`;

export const sitePageBHtml = `
<html>
<head><title>Page B</title><meta name="keywords" content="b, second"></head>
<body>
  <a href="https://site.test/">Home</a>
  <a href="https://external.test/d">Elsewhere</a>
</body>
</html>
`;

export const sitePageCHtml = `
<html>
<head><title></title></head>
<body><p>Video page</p><video src="/intro.mp4"></video></body>
</html>
`;

// ============================================================================
// Blog post with navigation, breadcrumbs, footer and mixed link kinds
// ============================================================================

export const BLOG_POST_URL = 'https://blog.test/posts/first';

export const blogPostHtml = `
<html>
<head><title>First post</title></head>
<body>
  <header><a href="/">Home</a></header>
  <nav>
    <a href="/archive">Archive of posts</a>
    <a href="/tags">Browse tags</a>
    <a href="https://www.blog.test/about">About</a>
  </nav>
  <div class="breadcrumbs"><a class="breadcrumb-item" href="/posts">Posts</a></div>
  <p>
    <a href="https://partner.test/offer">Partner offer page</a>
    <a href="//cdn.test/file.pdf">Download the file</a>
    <a href="https://partner.test/offer">Partner again</a>
    <a href="#comments">Comments</a>
    <a href="mailto:editor@blog.test">Email</a>
    <a href="tel:+100">Call</a>
    <a href="javascript:void(0)">Noop</a>
    <a href="/archive#2024">click here</a>
  </p>
  <footer><a href="/privacy">Privacy policy</a></footer>
</body>
</html>
`;
